export class ConfigError extends Error {
  constructor(message: string, public readonly option?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class IdCollisionExhaustedError extends Error {
  constructor(message: string, public readonly baseId: string, public readonly attempts: number) {
    super(message);
    this.name = 'IdCollisionExhaustedError';
  }
}

export class RegistryFrozenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryFrozenError';
  }
}

export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}
