import fs from 'fs-extra';
import { ConfigurationError, ImageNotFoundError, errorMessage } from '../errors';
import logger from '../utils/logger';

interface ImageSpec {
  registry: string;
  repository: string;
  tag: string;
}

interface ImageTable {
  registries: Record<string, Record<string, string>>;
  images: Record<string, Record<string, ImageSpec>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(entry => typeof entry === 'string');
}

function isImageSpec(value: unknown): value is ImageSpec {
  return isRecord(value)
    && typeof value.registry === 'string'
    && typeof value.repository === 'string'
    && typeof value.tag === 'string';
}

function isImageTable(value: unknown): value is ImageTable {
  if (!isRecord(value) || !isRecord(value.registries) || !isRecord(value.images)) {
    return false;
  }
  return Object.values(value.registries).every(isStringMap)
    && Object.values(value.images).every(versions => isRecord(versions) && Object.values(versions).every(isImageSpec));
}

/**
 * Resolves the ECR image for a SageMaker built-in framework from the registry table.
 */
export class ImageUriService {
  private table: ImageTable | null = null;

  constructor(private readonly tablePath: string) {}

  retrieve(framework: string, region: string, version: string): string {
    const table = this.load();

    const versions = table.images[framework];
    if (!versions) {
      throw new ImageNotFoundError(`Unknown framework: ${framework}`, { framework });
    }

    const spec = versions[version];
    if (!spec) {
      throw new ImageNotFoundError(
        `Unsupported ${framework} version ${version}, available: ${Object.keys(versions).join(', ')}`,
        { framework, version }
      );
    }

    const account = table.registries[spec.registry]?.[region];
    if (!account) {
      throw new ImageNotFoundError(`No ${framework} image registry in region ${region}`, { framework, version, region });
    }

    const domain = region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
    const uri = `${account}.dkr.ecr.${region}.${domain}/${spec.repository}:${spec.tag}`;
    logger.debug(`Resolved image ${framework}:${version} -> ${uri}`, { region });
    return uri;
  }

  private load(): ImageTable {
    if (this.table) {
      return this.table;
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.tablePath);
    } catch (error) {
      throw new ConfigurationError(`Cannot read image registry table: ${errorMessage(error)}`, {
        path: this.tablePath
      }, error);
    }

    if (!isImageTable(raw)) {
      throw new ConfigurationError('Image registry table has an unexpected shape', { path: this.tablePath });
    }

    this.table = raw;
    return raw;
  }
}
