export * from "./types/brands";
export * from "./core/types";
export * from "./core/errors";
export { Journal, JournaledCell, JournaledLog, JournaledMap } from "./core/journal";
export { AccessControl, DEFAULT_ADMIN_ROLE, MINTER_ROLE } from "./core/access";
export { AllowlistStore } from "./core/allowlist";
export { DispatchTable, decodeCall, encodeCall } from "./core/dispatch";
export type { CallContext, Facet, Handler } from "./core/dispatch";
export { FailureLedger } from "./core/ledger";
export { CrossChainMessenger } from "./core/messenger";
export type { MessengerHost } from "./core/messenger";
export { Unit } from "./core/unit";
export type { FacetCut, UnitOptions, UnitParams } from "./core/unit";
export * from "./codec/rlp";
export { computeMessageId, roleId, selectorOf } from "./crypto/hash";
export { Chain } from "./env/chain";
export { Erc20 } from "./env/erc20";
export { LocalRouter } from "./relay/localRouter";
export type { DeliveryReport, FeeSchedule, OutMsg, RouterOptions } from "./relay/localRouter";
export { createNftFacet, NFT } from "./facets/nft";
export { provisionUnit } from "./provision";
export type { FacetFactory } from "./provision";
export { loadConfig } from "./config";
export type { Config } from "./config";
export { makeLogger, loggable } from "./logging";
export type { ILogger, LogLevel } from "./logging";
export { DEFAULT_NATIVE_FEES, LocalNetwork } from "./network";
