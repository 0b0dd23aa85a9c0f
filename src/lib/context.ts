import type { AppConfig } from './config.js';
import { loadVocabulary, type Vocabulary } from './datasets.js';
import type { Logger } from './logger.js';

/** Everything a command needs, built once at startup and passed down explicitly. */
export interface AppContext {
  config: AppConfig;
  vocabulary: Vocabulary;
  logger: Logger;
}

export function createContext(config: AppConfig, logger: Logger): AppContext {
  return { config, vocabulary: loadVocabulary(config.datasets.dir), logger };
}
