export class ProcessingError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "ProcessingError";
  }
}

export class StageExecutionError extends ProcessingError {
  stageName: string;
  originalError: Error;
  attempts: number;

  constructor(stageName: string, originalError: Error, attempts = 1) {
    const message = `Stage '${stageName}' failed: ${originalError.message}`;
    super(message);
    this.name = "StageExecutionError";
    this.stageName = stageName;
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

export class GraphStoreError extends Error {
  constructor(message: string, public readonly operation?: string) {
    super(message);
    this.name = "GraphStoreError";
  }
}

export class StageInitializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StageInitializationError";
  }
}
