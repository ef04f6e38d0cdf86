export class EmbedderUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbedderUnavailableError";
  }
}

export class EmbedderNotFittedError extends Error {
  constructor(provider: string) {
    super(`Embedding provider "${provider}" must be fitted before it can embed`);
    this.name = "EmbedderNotFittedError";
  }
}

export class EmbedderAlreadyFittedError extends Error {
  constructor(provider: string) {
    super(`Embedding provider "${provider}" has already been fitted`);
    this.name = "EmbedderAlreadyFittedError";
  }
}
