/**
 * Library wide settings
 */
export interface Configuration {
  /**
   * Registers every container with a FinalizationRegistry so that containers collected while
   * still holding a value are reported and their value destroyed
   */
  leakDetection: boolean;

  logger: Pick<Console, "warn">;
}

const defaults: Configuration = {
  leakDetection: false,
  logger: console,
};

let current: Configuration = { ...defaults };

/**
 * Overrides the given settings, leaving the rest untouched
 * @param options
 * @returns the settings now in effect
 */
export function configure(options: Partial<Configuration>): Readonly<Configuration> {
  current = { ...current, ...options };
  return current;
}

export function getConfiguration(): Readonly<Configuration> {
  return current;
}

/**
 * Restores the default settings
 */
export function resetConfiguration() {
  current = { ...defaults };
}
