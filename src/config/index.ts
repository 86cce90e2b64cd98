export {
    AuthenticationConfig,
    type ConfigField,
    type ConfigInput,
    type ConfigValue,
} from "./auth-config.js";
export { SecretField, SecretValue, SECRET_MASK, isSecretSchema } from "./secret.js";
