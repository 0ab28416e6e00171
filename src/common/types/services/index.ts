/**
 * Service-level type definitions shared by the mixin base classes.
 */

export * from "./base.types";
export * from "./mixins";
