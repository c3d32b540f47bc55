/**
 * Type barrel for @linked-token/node.
 */

// DTOs
export {
  TokenAmountSchema,
  TransferIdSchema,
  InitiateTransferSchema,
  ListTransfersQuerySchema,
  TransferIdParamSchema,
  LinkContractSchema,
  ListEventsQuerySchema,
  BalanceParamSchema,
} from "./dto.js";
export type {
  InitiateTransferDto,
  ListTransfersQuery,
  LinkContractDto,
  ListEventsQuery,
} from "./dto.js";

// Wire forms
export {
  AddressSchema,
  HexSchema,
  DecimalSchema,
  U64Schema,
  SubnetSchema,
  IpcAddressSchema,
  EnvelopeSchema,
  serializeIpcAddress,
  serializeEnvelope,
  serializeTransfer,
} from "./wire.js";
export type { IpcAddressJson, EnvelopeJson, TransferJson } from "./wire.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyAuthContext,
  UnsecuredAuthContext,
  ApiKeyRecord,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
