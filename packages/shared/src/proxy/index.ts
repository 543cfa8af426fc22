/**
 * Request schemas for the provider proxy endpoints.
 *
 * @remarks
 * Import from `@read-along/shared/proxy` so browser clients validate payloads
 * with the same rules the backend applies before forwarding anything.
 */
export * from "./schemas.js";
