export * from "./utils/errors";
export { getClientConfig, resetClientConfig, getEnvOrDefault } from "./utils/config";
export type { ClientConfig } from "./utils/config";
export { getLogger, resetLogging, Logger } from "./utils/logger";
export { generateProperUrl, joinUrl } from "./utils/url";
export { formatFieldTree } from "./utils/field-tree";

export {
  ABSENT,
  isAbsent,
  FieldTree,
  OperationSchema,
} from "./schemas/field-spec";
export type {
  Absent,
  Backend,
  ChoiceGroup,
  FieldSpec,
  FieldType,
  HttpBinding,
  NormalizedResponse,
  NormalizedValue,
  PrimitiveName,
  RequestPayload,
  RequestValue,
  Scalar,
} from "./schemas/field-spec";
export {
  SchemaIndex,
  compareVersions,
  listSchemaVersions,
  loadSchemaSources,
} from "./schemas/schema-index";
export type { SchemaSource } from "./schemas/schema-index";
export { getIndex, refresh, resetSchemaRegistry } from "./schemas/schema-registry";
export { verify, assertValid, VALUE_KEY } from "./schemas/signature-verifier";
export type { ValidationResult } from "./schemas/signature-verifier";
export { normalize } from "./schemas/response-normalizer";
export { diffSchemaVersions } from "./schemas/schema-drift";
export type { DriftReport, OperationDrift, FieldChange } from "./schemas/schema-drift";

export type { Transport, Credentials } from "./clients/transport";
export { SoapTransport } from "./clients/soap-transport";
export { RestTransport } from "./clients/rest-transport";
export { ApiFacade } from "./clients/api-facade";
export type { FacadeOptions, OperationCall } from "./clients/api-facade";
export { AxlClient, axlNamespace, axlSoapAction } from "./clients/axl-client";
export type { AxlCallOptions, AxlClientOptions } from "./clients/axl-client";
export { RisPortClient } from "./clients/risport-client";
export { CupiClient } from "./clients/cupi-client";
export { buildReturnedTags, returnedTagNames } from "./clients/returned-tags";
export {
  validateUcmServer,
  validateAxlAuth,
  getUcmVersion,
} from "./clients/server-diagnostics";
