/**
 * Docker/OCI repository resource IDs.
 *
 * Two shapes, tried in order:
 *
 * 1. repository URI: `[http[s]://]host[:port]/<repository>`. The canonical
 *    ID drops the scheme; the `registry` field is `host[:port]`.
 * 2. Docker Hub repository name: `<repository>` made of letters, digits and
 *    dashes. Canonical ID is the name itself; `registry` is undefined.
 *
 * @module
 */

import type { ResourceIdResolver } from "../types.js";
import { createShapeResolver } from "./resolver.js";

export const DOCKER_RESOURCE_TYPE = "docker-registry";

const REPOSITORY_URI = /^(?:https?:\/\/)?([A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*(?::[0-9]+)?)\/(.+)$/;
const HUB_REPOSITORY = /^[A-Za-z0-9-]+$/;

export const dockerRepositoryResolver: ResourceIdResolver = createShapeResolver(DOCKER_RESOURCE_TYPE, [
    {
        name: "repository URI",
        format: "[https://]host[:port]/<repository-name>",
        pattern: REPOSITORY_URI,
        decompose(match) {
            const registry = match[1] ?? "";
            const path = match[2] ?? "";
            return { canonicalId: `${registry}/${path}`, fields: { registry } };
        },
    },
    {
        name: "Docker Hub repository name",
        format: "<repository-name>",
        pattern: HUB_REPOSITORY,
        decompose(match) {
            return { canonicalId: match[0], fields: { registry: undefined } };
        },
    },
]);
