/**
 * Core public TypeScript types for fieldkit.
 *
 * - Fields are descriptors: required, ignored, computed, post-resolved, delegated
 * - Factories resolve fields in two passes and build objects from the values
 * - Registries map factory ids to live factories for delegated fields
 */
export * from "./types/utilities";
export * from "./types/field";
export * from "./types/factory";
export * from "./types/error";
