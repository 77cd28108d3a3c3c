/** A board or rules file exists but cannot be turned into a game. */
export class GameConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'GameConfigurationError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** No board/rules file for the requested game. */
export class GameConfigurationNotFoundError extends GameConfigurationError {
  constructor(
    public readonly gameName: string,
    public readonly configurationType: ConfigurationType,
  ) {
    super(`No ${configurationType} configuration found for game '${gameName}'.`);
    this.name = 'GameConfigurationNotFoundError';
  }
}

export class UnknownRuleError extends Error {
  constructor(public readonly ruleName: string) {
    super(`Unknown rule '${ruleName}'.`);
    this.name = 'UnknownRuleError';
  }
}

export type ConfigurationType = 'board' | 'rules';
