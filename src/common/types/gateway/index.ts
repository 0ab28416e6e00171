export * from "./account.types";
export * from "./cookie.types";
export * from "./site.types";
