export * as ArchiveCodec from "./archive_codec";
export * as AccountStore from "./account_store";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Crypto from "./crypto";
export * as Logger from "./logger";
export * as OperationLog from "./operation_log";
export * as Reconciler from "./reconciler";
export * as Records from "./record_types";
export * as RunLogStore from "./run_log_store";
export * as Schemas from "./record_schemas";
export * as Transfer from "./transfer";
export * as Utils from "./utils";
