export const LOCALNET_FILES = {
  /** Marker and config file that identifies a localnet working directory */
  config: 'localnet.config.json',
  programsDir: './programs',
  accountsDir: './accounts',
} as const;

/** Environment variables that override the fixture directories */
export const LOCALNET_ENV = {
  programsDir: 'PROGRAMS_DIR',
  accountsDir: 'ACCOUNTS_DIR',
} as const;
