export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DataSourceError extends Error {
  constructor(message: string, public readonly path?: string) {
    super(message);
    this.name = 'DataSourceError';
  }
}

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}
