/**
 * The invocation payload could not be read as a tool-use event.
 * Not a policy verdict: the gate exits 1, never 2, for this.
 */
export class InputParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputParseError";
  }
}

/**
 * A policy file exists but cannot be used.
 */
export class PolicyConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Invalid policy file ${filePath}: ${message}`);
    this.name = "PolicyConfigError";
    this.filePath = filePath;
  }
}
