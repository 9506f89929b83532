import { z } from "zod";

// Common types used across change and config schemas

/**
 * Change id pattern - lowercase kebab-case tokens
 */
export const changeIdPattern = /^[a-z]+(-[a-z0-9]+)*$/;

/**
 * Capability name pattern - lowercase kebab-case, may start with a digit
 */
export const capabilityPattern = /^[a-z0-9]+(-[a-z0-9]+)*$/;

// Base schemas
export const ChangeIdSchema = z
  .string()
  .regex(changeIdPattern, "Invalid change id format");
export const CapabilityNameSchema = z
  .string()
  .regex(capabilityPattern, "Invalid capability name");

// ISO 8601 date or datetime
export const DateTimeSchema = z.union([
  z.string().datetime(),
  z.string().date(),
]);

// Lifecycle status, in transition order
export const ChangeStatusSchema = z.enum([
  "draft",
  "validated",
  "applied",
  "archived",
]);

// Diagnostic severity
export const SeveritySchema = z.enum(["error", "warning"]);

export type ChangeId = z.infer<typeof ChangeIdSchema>;
export type CapabilityName = z.infer<typeof CapabilityNameSchema>;
export type DateTime = z.infer<typeof DateTimeSchema>;
export type ChangeStatus = z.infer<typeof ChangeStatusSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
