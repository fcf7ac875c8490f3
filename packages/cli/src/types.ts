export type CliResponse = {
  stdout?: string;
  stderr?: string;
  exitCode: number;
};

export type CliRequest = {
  argv: readonly string[];
  /** Overrides the config's colour setting for this request. */
  color?: boolean;
  /** Overrides the config's debug setting for this request. */
  debug?: boolean;
};
