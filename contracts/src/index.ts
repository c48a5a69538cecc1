// index.ts - Re-exports from all modules

// Types & primitives
export type {
  ProviderName,
  ResourceKind,
  ResourceHandle,
  Value,
} from './types';

export {
  bindHandle,
  absent,
  pending,
  known,
  isKnown,
  valueOr,
  fromOptional,
  fromRemote,
} from './types';

// Records
export type {
  InstanceDesired,
  InstanceState,
  SshKeyDesired,
  SshKeyState,
  CreateResult,
  DriftEntry,
  ReadOutcome,
  DeleteOutcome,
} from './records';

export {
  INSTANCE_IDENTITY_FIELDS,
  SSH_KEY_IDENTITY_FIELDS,
} from './records';

// Errors
export {
  GpuformError,
  ValidationError,
  ConfigurationError,
} from './errors';

export type { ErrorCategory } from './errors';

// Schema surface
export type {
  ProviderConfigInput,
  InstanceConfig,
  SshKeyConfig,
  ResourceTypeInfo,
  AttributeInfo,
} from './schema';

export {
  PROVIDER_TYPE_NAME,
  ProviderConfigSchema,
  InstanceConfigSchema,
  SshKeyConfigSchema,
  RESOURCE_TYPES,
  resourceTypeName,
  describeAttributes,
  sensitiveAttributes,
  bindInstanceConfig,
  bindSshKeyConfig,
  bindProviderConfig,
} from './schema';
