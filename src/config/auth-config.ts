/**
 * AuthenticationConfig: a validated credential bundle for one auth method.
 *
 * Input is checked against the method's TypeBox schema when the config is
 * built; an invalid bundle never exists as an `AuthenticationConfig`.
 *
 * @module
 */

import { createHash } from "node:crypto";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "../errors.js";
import type { AuthMethodSpec } from "../types.js";
import { isSecretSchema, SecretValue } from "./secret.js";

/** A plain (non-secret) configuration value. */
export type ConfigValue = string | number | boolean;

/** A stored configuration field: plain or secret. */
export type ConfigField = ConfigValue | SecretValue;

/** Raw configuration input, as supplied by a caller. */
export type ConfigInput = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isConfigValue(value: unknown): value is ConfigValue {
    return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Typed, validated credential bundle.
 *
 * Secret fields (declared with `SecretField()`) are held as
 * {@link SecretValue}s and only leave the object in cleartext through
 * {@link secret} or `toPlain({ revealSecrets: true })`.
 */
export class AuthenticationConfig {
    readonly method: string;
    private readonly values: ReadonlyMap<string, ConfigField>;

    private constructor(method: string, values: Map<string, ConfigField>) {
        this.method = method;
        this.values = values;
    }

    /**
     * Validate raw input against an auth method's schema.
     *
     * Schema defaults are applied first. Inputs may already hold
     * `SecretValue`s, which are unwrapped for validation and re-wrapped.
     *
     * @throws ConfigurationError listing every failing field path.
     */
    static parse(method: AuthMethodSpec, input: ConfigInput | AuthenticationConfig): AuthenticationConfig {
        const raw = input instanceof AuthenticationConfig ? input.toPlain({ revealSecrets: true }) : input;
        const plain: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(raw)) {
            if (value === undefined) continue;
            plain[key] = value instanceof SecretValue ? value.reveal() : value;
        }

        const schema = method.configSchema;
        const candidate = Value.Default(schema, Value.Clone(plain));
        const problems = [...Value.Errors(schema, candidate)].map(
            (e) => `${e.path || "/"}: ${e.message}`,
        );
        if (problems.length > 0 || !isRecord(candidate)) {
            throw new ConfigurationError(
                `Invalid configuration for auth method "${method.id}":\n${problems.map((p) => `  - ${p}`).join("\n")}`,
            );
        }

        const values = new Map<string, ConfigField>();
        for (const [key, propSchema] of Object.entries(schema.properties)) {
            const value = candidate[key];
            if (value === undefined) continue;
            if (!isConfigValue(value)) {
                throw new ConfigurationError(
                    `Configuration field "${key}" of auth method "${method.id}" must be a string, number or boolean.`,
                );
            }
            values.set(key, isSecretSchema(propSchema) ? new SecretValue(String(value)) : value);
        }

        return new AuthenticationConfig(method.id, values);
    }

    /** Field names that hold a value. */
    fields(): string[] {
        return Array.from(this.values.keys());
    }

    has(field: string): boolean {
        return this.values.has(field);
    }

    isSecret(field: string): boolean {
        return this.values.get(field) instanceof SecretValue;
    }

    /** Raw field value; secret fields come back as {@link SecretValue}. */
    get(field: string): ConfigField | undefined {
        return this.values.get(field);
    }

    /**
     * Read a non-secret string field.
     *
     * @throws ConfigurationError if the field holds a non-string or a secret.
     */
    string(field: string): string | undefined {
        const value = this.values.get(field);
        if (value === undefined) return undefined;
        if (typeof value !== "string") {
            throw new ConfigurationError(`Configuration field "${field}" is not a plain string.`);
        }
        return value;
    }

    /**
     * Cleartext of a secret field.
     *
     * @throws ConfigurationError if the field is absent or not secret.
     */
    secret(field: string): string {
        const value = this.values.get(field);
        if (!(value instanceof SecretValue)) {
            throw new ConfigurationError(`Configuration field "${field}" is not a secret of auth method "${this.method}".`);
        }
        return value.reveal();
    }

    /** Cleartext of an optional secret field. */
    optionalSecret(field: string): string | undefined {
        return this.values.has(field) ? this.secret(field) : undefined;
    }

    /**
     * Stable hash over the method and every field value, secrets included.
     * Changes whenever any credential changes.
     */
    fingerprint(): string {
        const entries = Array.from(this.values.entries())
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, value]) => [key, value instanceof SecretValue ? value.reveal() : value]);
        return createHash("sha256").update(JSON.stringify([this.method, entries])).digest("hex");
    }

    /**
     * Field map as plain values. Secrets stay wrapped unless `revealSecrets`
     * is set.
     */
    toPlain(options?: { revealSecrets?: boolean }): Record<string, ConfigField> {
        const result: Record<string, ConfigField> = {};
        for (const [key, value] of this.values) {
            result[key] = options?.revealSecrets && value instanceof SecretValue ? value.reveal() : value;
        }
        return result;
    }

    /** Masked representation; secrets render as `**********`. */
    toJSON(): Record<string, ConfigValue> {
        const result: Record<string, ConfigValue> = {};
        for (const [key, value] of this.values) {
            result[key] = value instanceof SecretValue ? value.toJSON() : value;
        }
        return result;
    }
}
