import { BaseService } from "./base.service";
import { WithLifecycle } from "./mixins/lifecycle.mixin";

/**
 * Service with managed timers, tracked background tasks and NestJS lifecycle hooks
 */
export abstract class StandardService extends WithLifecycle(BaseService) {}
