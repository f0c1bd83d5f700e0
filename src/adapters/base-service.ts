import { logger as defaultLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

type ServiceLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export class BaseService {
  protected logger?: Logger;

  setLogger(logger: Logger) { this.logger = logger; }

  log(level: ServiceLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    switch (level) {
      case 'DEBUG': return lg.debug(message, meta);
      case 'INFO': return lg.info(message, meta);
      case 'WARN': return lg.warn(message, meta);
      case 'ERROR': return lg.error(message, meta);
    }
  }

  /** Category-aware log; falls back to the plain level methods when the logger has no `log`. */
  clog(category: string, level: ServiceLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    if (lg.log) return lg.log(level, category, message, meta);
    return this.log(level, message, meta);
  }
}

export default BaseService;
