/**
 * Shape-based resource ID resolution.
 *
 * A resolver holds an ordered list of shapes. `parse` classifies the raw
 * string into the first shape whose pattern matches and lets that shape
 * decompose it; a string no shape matches is rejected. Each shape's canonical
 * form must itself match a shape that maps it to the same canonical form, so
 * canonicalization is idempotent.
 *
 * @module
 */

import { InvalidResourceIdError } from "../errors.js";
import type { ParsedResourceId, ResourceIdResolver } from "../types.js";

/** One accepted resource ID shape. */
export interface ResourceIdShape {
    /** Short name used in diagnostics (e.g., "repository URI"). */
    name: string;
    /** Human-readable format (e.g., "[https://]host[:port]/<repository>"). */
    format: string;
    /** Anchored pattern the raw string must match. */
    pattern: RegExp;
    /** Build the canonical ID and fields from a successful match. */
    decompose(match: RegExpExecArray): {
        canonicalId: string;
        fields: Record<string, string | undefined>;
    };
}

/**
 * Build a resolver from an ordered list of shapes.
 *
 * @example
 * ```ts
 * const bucketResolver = createShapeResolver("bucket", [
 *     {
 *         name: "bucket name",
 *         format: "<bucket>",
 *         pattern: /^([a-z0-9-]+)$/,
 *         decompose: (m) => ({ canonicalId: m[1] ?? "", fields: { bucket: m[1] } }),
 *     },
 * ]);
 * ```
 */
export function createShapeResolver(
    resourceType: string,
    shapes: readonly ResourceIdShape[],
): ResourceIdResolver {
    const formats = shapes.map((shape) => `${shape.name}: ${shape.format}`);

    return {
        resourceType,
        formats,
        parse(raw: string): ParsedResourceId {
            for (const shape of shapes) {
                // Fresh exec per call: shapes may carry global/sticky flags.
                shape.pattern.lastIndex = 0;
                const match = shape.pattern.exec(raw);
                if (!match) continue;
                const { canonicalId, fields } = shape.decompose(match);
                return { raw, canonicalId, fields: Object.freeze({ ...fields }) };
            }
            throw new InvalidResourceIdError(resourceType, raw, formats);
        },
    };
}
