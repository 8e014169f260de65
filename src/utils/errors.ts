// Error types shared by the extraction pipeline

export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class DegenerateInputError extends Error {
  readonly component: string;

  constructor(component: string, message: string) {
    super(`${component}: ${message}`);
    this.name = 'DegenerateInputError';
    this.component = component;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
