/**
 * S3 bucket resource IDs.
 *
 * Accepts `s3://<bucket>[/]`, `arn:aws:s3:::<bucket>` and a bare
 * `<bucket>`; all canonicalize to `s3://<bucket>`.
 *
 * @module
 */

import type { ResourceIdResolver } from "../types.js";
import { createShapeResolver } from "./resolver.js";

export const S3_RESOURCE_TYPE = "s3-bucket";

const BUCKET = "[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]";

function bucketId(match: RegExpExecArray): { canonicalId: string; fields: Record<string, string | undefined> } {
    const bucket = match[1] ?? "";
    return { canonicalId: `s3://${bucket}`, fields: { bucket } };
}

export const s3BucketResolver: ResourceIdResolver = createShapeResolver(S3_RESOURCE_TYPE, [
    {
        name: "S3 URI",
        format: "s3://<bucket-name>",
        pattern: new RegExp(`^s3://(${BUCKET})/?$`),
        decompose: bucketId,
    },
    {
        name: "S3 bucket ARN",
        format: "arn:aws:s3:::<bucket-name>",
        pattern: new RegExp(`^arn:aws:s3:::(${BUCKET})$`),
        decompose: bucketId,
    },
    {
        name: "S3 bucket name",
        format: "<bucket-name>",
        pattern: new RegExp(`^(${BUCKET})$`),
        decompose: bucketId,
    },
]);
