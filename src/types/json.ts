/** JSON primitive value. */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Schema-free structured value used for request and response bodies.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** JSON object with string keys. */
export type JsonObject = { [key: string]: JsonValue };
