/** A configuration that failed substitution or verification. */
export class GatewayConfigError extends Error {
  readonly summary: string;

  readonly violations: string[];

  constructor(summary: string, violations: string[] = []) {
    super(violations.length > 0 ? `${summary}: ${violations.join('; ')}` : summary);
    this.name = 'GatewayConfigError';
    this.summary = summary;
    this.violations = violations;
  }
}

export class NginxSyntaxError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = 'NginxSyntaxError';
    this.line = line;
  }
}
