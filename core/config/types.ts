/**
 * One argument position in a configured interpreter template.
 * Plain strings are literal arguments; `{ slot }` marks where the code or the executable name goes.
 */
export type ConfigArgument = string | { slot: 'code' | 'name' };

export interface LanguageConfig {
  executable: string;
  argv: ConfigArgument[];
}

/**
 * Shape of `~/.config/mdtask.json` and `mdtask.config.json`
 */
export interface MdtaskConfig {
  /** Added or overriding language mappings, keyed by fence tag */
  languages?: Record<string, LanguageConfig>;
  /** File names searched for the document, in priority order */
  documentNames?: string[];
  /** Default level for service loggers */
  logLevel?: string;
}
