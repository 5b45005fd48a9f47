export * as Git from "./git";
export * as Inception from "./inception";
export * as SigningKey from "./signing_key";
export * as AllowedSigners from "./allowed_signers";
export * as SigningConfig from "./signing_config";
export * as Repository from "./repository_setup";
export * as GitHub from "./github/index";
export * as Templates from "./template_installer";
export * as Config from "./config_manager";
export * as Logger from "./logger";
export * as Errors from "./errors";
