import { commonLogger } from "./logger";

type GeneratorErrorOptions = {
  context?: Record<string, unknown>;
};

/**
 * Basic generic error for the generator. Throw this error if you don't know what to throw.
 */
export class GeneratorError extends Error {
  options?: GeneratorErrorOptions;

  constructor(message: string, options?: GeneratorErrorOptions) {
    super(message);
    this.name = new.target.name;
    commonLogger.debug("GeneratorError constructor", {
      errorName: this.name,
      errorMessage: message,
      errorOptions: options,
    });
    this.options = options;
  }

  get context(): Record<string, unknown> {
    return this.options?.context ?? {};
  }
}

/**
 * One or more selected labels have no rule entry in the extractor output
 */
export class LabelResolutionError extends GeneratorError {
  constructor(message: string, context: { labels: string[] }) {
    super(message, { context });
  }
}

/**
 * A rule kind that cannot be expressed as an Xcode product
 */
export class UnsupportedRuleKindError extends GeneratorError {
  constructor(message: string, context: { label: string; kind: string }) {
    super(message, { context });
  }
}

export class SerializationError extends GeneratorError {
  constructor(message: string, context: { objectType?: string; reason: string }) {
    super(message, { context });
  }
}

export class DirectoryCreationError extends GeneratorError {
  constructor(message: string, context: { path: string; errorMessage: string }) {
    super(message, { context });
  }
}

/**
 * Configuration file is missing fields or has values of the wrong shape
 */
export class ConfigError extends GeneratorError {
  constructor(message: string, context: { path?: string; issues: string[] }) {
    super(message, { context });
  }
}

/**
 * Rule entries document produced by Bazel doesn't match the expected schema
 */
export class ExtractorDocumentError extends GeneratorError {
  constructor(message: string, context: { path?: string; issues: string[] }) {
    super(message, { context });
  }
}

/**
 * Unknown error of executing shell command. See: exec
 */
export class ExecBaseError extends GeneratorError {
  constructor(
    message: string,
    context: { errorMessage: string; stderr?: string; command: string; args: string[]; cwd?: string },
  ) {
    super(message, { context });
  }
}

/**
 * Stderr of executing shell command. See: exec
 */
export class ExecError extends ExecBaseError {}
