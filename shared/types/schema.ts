/**
 * Schema and Message Types
 *
 * A Schema identifies the shape of an artifact's content by name and version.
 * A Message is the payload produced for one artifact: a schema tag plus content
 * the engine never inspects.
 */

import { z } from "zod";

/**
 * Schema identifier. Compatibility between artifacts is exact (name, version)
 * equality, never structural comparison of content.
 */
export const SchemaRefSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});
export type Schema = z.infer<typeof SchemaRefSchema>;

/**
 * Version assumed when a schema string omits one (e.g. "standard_input").
 */
export const DEFAULT_SCHEMA_VERSION = "1.0.0";

/**
 * Payload produced for one (runId, artifactId) pair.
 */
export const MessageSchema = z.object({
  /** Identifier of this message (unique per produced payload) */
  id: z.string().min(1),
  /** Schema the content conforms to */
  schema: SchemaRefSchema,
  /** Opaque content */
  content: z.unknown(),
  /** ISO 8601 timestamp when the message was produced */
  producedAt: z.string().optional(),
  /** Free-form metadata attached by the producing component */
  metadata: z.record(z.string(), z.unknown()).optional(),
});
export type Message = z.infer<typeof MessageSchema>;
