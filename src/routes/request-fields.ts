import { InvalidInputError } from "../errors.js";
import { isRecord } from "../json-fields.js";

/**
 * Optional string field of a JSON body. Absent, null and blank strings all
 * read as undefined; any other non-string is rejected.
 */
export function optionalBodyString(body: unknown, field: string): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new InvalidInputError(`${field} must be a string`);
  }
  return value.trim() ? value : undefined;
}

export function requireBodyString(body: unknown, field: string): string {
  const value = optionalBodyString(body, field);
  if (value === undefined) {
    throw new InvalidInputError(`${field} is required`);
  }
  return value;
}

export function requireQueryString(value: unknown, name: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new InvalidInputError(`Query parameter "${name}" is required`);
  }
  return value;
}
