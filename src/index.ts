// Core
export * from "./core/Toolkit";
export * from "./core/config";
export * from "./core/errors";
export * from "./core/ledger";
export * from "./core/utils";

// Managers
export * from "./managers/WalletManager";
export * from "./managers/TokenManager";
export * from "./managers/MetadataManager";

// Utils
export * from "./utils/confirm";
export * from "./utils/keypairs";
export * from "./utils/transactions";
export * from "./utils/vanity";

// CLI
export * from "./cli";
