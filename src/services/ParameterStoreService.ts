import { ConfigurationError, errorMessage } from '../errors';
import logger from '../utils/logger';
import { SsmApi } from './clients';

export class ParameterStoreService {
  constructor(private readonly ssmClient: SsmApi) {}

  /**
   * Decrypted value of a parameter, by name or ARN.
   */
  async getValue(name: string): Promise<string> {
    logger.info(`Retrieving ${name} from parameter store`);

    let value: string | undefined;
    try {
      const response = await this.ssmClient.getParameter({ Name: name, WithDecryption: true });
      value = response.Parameter?.Value;
    } catch (error) {
      throw new ConfigurationError(`Failed to read parameter ${name}: ${errorMessage(error)}`, { parameter: name }, error);
    }

    if (!value) {
      throw new ConfigurationError(`Parameter ${name} has no value`, { parameter: name });
    }
    return value;
  }
}
