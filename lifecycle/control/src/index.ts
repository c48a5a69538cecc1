// index.ts - Public surface of the lifecycle package

export {
  createProvider,
  LambdaProvider,
  ResourceReconciler,
  resourceRegistry,
  type ProviderOptions,
  type InstanceReconciler,
  type SshKeyReconciler,
  type AnyReconciler,
} from "./provider/registry";

export {
  LambdaClient,
  LAMBDA_API_BASE,
  basicAuthHeader,
  buildUrl,
  type HttpMethod,
  type LambdaClientConfig,
  type RequestOptions,
} from "./provider/client";

export {
  ProviderOperationError,
  TransportError,
  DecodeError,
  RemoteError,
  NotFoundError,
  ResponseCardinalityError,
  classifyResponse,
  classifyTransportFailure,
  mapLambdaError,
  isNotFound,
} from "./provider/errors";

export {
  loadProviderConfig,
  resolveLambdaConfig,
  type ProviderConfig,
  type LambdaConfig,
  type ResolvedLambdaConfig,
} from "./provider/config";

export { findById } from "./provider/match";
export { InstanceController, planInstance, projectInstance } from "./provider/resources/instance";
export { SshKeyController, planSshKey, projectSshKey } from "./provider/resources/ssh-key";
export type { ResourceController } from "./provider/types";
