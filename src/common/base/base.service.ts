import { WithLogging } from "./mixins/logging.mixin";
import type { BaseServiceOptions, IBaseService } from "../types/services/base.types";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-unused-vars
  constructor(..._args: any[]) {}
}

const LoggingBase = WithLogging(SimpleBase);

/**
 * Base service class. Every injectable in the gateway extends this (directly or
 * through StandardService) to get a class-named NestJS logger.
 */
export abstract class BaseService extends LoggingBase implements IBaseService {
  constructor(options: BaseServiceOptions = {}) {
    super();
    if (options.useEnhancedLogging) {
      this.initializeEnhancedLogging(true);
    }
  }
}
