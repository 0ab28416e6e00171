import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";
import type { EnhancedLoggerService } from "../../logging/enhanced-logger.service";

/**
 * Options accepted by every service built on BaseService
 */
export interface BaseServiceOptions {
  useEnhancedLogging?: boolean;
}

/**
 * Minimal surface every service exposes to the mixins layered on top of it
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
  enhancedLogger?: EnhancedLoggerService;
}
