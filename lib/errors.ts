export enum WEBSERVER_EXCEPTIONS {
  /**
   * Throws when the configuration file or a context override does not describe a deployable environment.
   */
  INVALID_CONFIGURATION = 'InvalidConfigurationException',
  /**
   * Throws when the stack to verify does not exist in the target region.
   */
  STACK_NOT_FOUND = 'StackNotFoundException',
  /**
   * Throws when a deployed stack lacks an output the verify commands rely on.
   */
  MISSING_OUTPUT = 'MissingOutputException',
  /**
   * Throws when the web endpoint did not answer 200 before the deadline.
   */
  PROBE_TIMEOUT = 'ProbeTimeoutException',
  /**
   * Throws when a verify command gets an argument it cannot work with.
   */
  INVALID_INPUT = 'InvalidInputException',
}

export class WebServerError extends Error {
  constructor(
    readonly code: WEBSERVER_EXCEPTIONS,
    message: string,
  ) {
    super(`${code}: ${message}`);
    this.name = code;
  }
}
