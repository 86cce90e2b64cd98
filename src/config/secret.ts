/**
 * Secret values and secret-tagged schema fields.
 *
 * @module
 */

import { inspect } from "node:util";
import { Type, type StringOptions, type TSchema, type TString } from "@sinclair/typebox";

/** Placeholder rendered in place of a secret's cleartext. */
export const SECRET_MASK = "**********";

/**
 * A string that never renders its cleartext: `toString`, `toJSON` and
 * `util.inspect` all yield {@link SECRET_MASK}. Call {@link reveal} to get the
 * value for use.
 */
export class SecretValue {
    readonly #value: string;

    constructor(value: string) {
        this.#value = value;
    }

    /** Cleartext value. */
    reveal(): string {
        return this.#value;
    }

    /** True when both secrets hold the same cleartext. */
    equals(other: SecretValue): boolean {
        return this.#value === other.#value;
    }

    toString(): string {
        return SECRET_MASK;
    }

    toJSON(): string {
        return SECRET_MASK;
    }

    [inspect.custom](): string {
        return `SecretValue(${SECRET_MASK})`;
    }
}

/**
 * Schema for a secret string field. The `secret` tag is what
 * {@link AuthenticationConfig} reads to wrap the value in a {@link SecretValue}.
 *
 * @example
 * ```ts
 * const PasswordCredentials = Type.Object({
 *     username: SecretField({ description: "Registry username" }),
 *     password: SecretField({ description: "Password or access token" }),
 * }, { additionalProperties: false });
 * ```
 */
export function SecretField(options?: StringOptions): TString {
    return Type.String({ minLength: 1, ...options, secret: true });
}

/** Whether a schema is tagged as secret. */
export function isSecretSchema(schema: TSchema): boolean {
    return schema["secret"] === true;
}
