import { ValidateBy, buildMessage, type ValidationOptions } from "class-validator";

export function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(entry => typeof entry === "string")
  );
}

/**
 * Plain object whose values are all strings (cookie jars, header maps)
 */
export function IsStringRecord(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: "isStringRecord",
      validator: {
        validate: (value: unknown) => isStringRecord(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be an object of string values`,
          validationOptions
        ),
      },
    },
    validationOptions
  );
}
