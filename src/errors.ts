export type ErrorContext = Record<string, unknown>;

export class DeploymentError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.context = context;
  }
}

/** The notification payload does not carry a usable S3 record. */
export class MalformedEventError extends DeploymentError {}

export type ProvisioningStep =
  | 'resolve-image'
  | 'create-model'
  | 'create-endpoint-config'
  | 'create-endpoint';

/** SageMaker rejected (or never got) one of the create calls. */
export class ProvisioningError extends DeploymentError {
  readonly step: ProvisioningStep;

  constructor(step: ProvisioningStep, message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { step, ...context }, cause);
    this.step = step;
  }
}

export class ImageNotFoundError extends ProvisioningError {
  constructor(message: string, context: ErrorContext = {}) {
    super('resolve-image', message, context);
  }
}

export class TrainingJobLookupError extends DeploymentError {}

/** The artifact key does not follow the training output layout. */
export class InvalidArtifactKeyError extends TrainingJobLookupError {}

export class InvalidS3UriError extends DeploymentError {}

export class NotificationError extends DeploymentError {}

export class ConfigurationError extends DeploymentError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
