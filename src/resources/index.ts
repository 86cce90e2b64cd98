/**
 * Resource ID resolvers: parsing and canonicalization per resource type.
 *
 * @example
 * ```ts
 * import { dockerRepositoryResolver } from "service-connectors/resources";
 *
 * const { canonicalId, fields } = dockerRepositoryResolver.parse("https://myhost:5000/team/app");
 * // canonicalId === "myhost:5000/team/app", fields.registry === "myhost:5000"
 * ```
 *
 * @module
 */

export { createShapeResolver, type ResourceIdShape } from "./resolver.js";
export { dockerRepositoryResolver, DOCKER_RESOURCE_TYPE } from "./docker.js";
export { s3BucketResolver, S3_RESOURCE_TYPE } from "./s3.js";
