import { WrappedError } from '@icmctl/utils';

export class RelayerConfigError extends WrappedError {}

export class RelayerInstallError extends WrappedError {}

export class RelayerLaunchError extends WrappedError {
  constructor(
    message: string,
    public readonly logPath: string,
    cause?: unknown,
  ) {
    super(`${message}. Logs can be found at ${logPath}`, cause);
  }
}

export class RelayerShutdownError extends WrappedError {
  constructor(
    message: string,
    public readonly pid: number,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class RelayerFundingError extends WrappedError {
  constructor(
    message: string,
    public readonly address: string,
    public readonly required?: string,
    public readonly actual?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class RelayerAlreadyRunningError extends WrappedError {}

export class RelayerNotRunningError extends WrappedError {}
