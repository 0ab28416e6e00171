export * from "./error.types";
