// schema.ts - Desired-State Surface (TypeBox) + Configuration Binding
//
// Field metadata lives here and only here. The reconciliation core works on
// the typed records in records.ts; attribute names, descriptions and the
// sensitive/computed flags matter only where configuration enters.

import { Type, type Static, type TObject, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ValidationError } from './errors';
import type { ResourceKind } from './types';
import type { InstanceDesired, SshKeyDesired } from './records';

// =============================================================================
// PROVIDER
// =============================================================================

export const PROVIDER_TYPE_NAME = 'lambdalabs';

export const ProviderConfigSchema = Type.Object(
  {
    api_key: Type.Optional(
      Type.String({ sensitive: true, description: 'Lambda API key to use' }),
    ),
    api_base: Type.Optional(
      Type.String({ description: 'Base URL of the Lambda Cloud API' }),
    ),
  },
  { additionalProperties: false },
);

export type ProviderConfigInput = Static<typeof ProviderConfigSchema>;

// =============================================================================
// RESOURCE SCHEMAS
// =============================================================================

export const InstanceConfigSchema = Type.Object(
  {
    region_name: Type.String({
      minLength: 1,
      description: 'Short name of a region',
    }),
    instance_type_name: Type.String({
      minLength: 1,
      description: 'Name of an instance type',
    }),
    ssh_key_names: Type.Array(Type.String(), {
      description:
        'Names of the SSH keys to allow access to the instances. Currently, exactly one SSH key must be specified.',
    }),
    file_system_names: Type.Optional(
      Type.Array(Type.String(), {
        description:
          'Names of the file systems to attach to the instances. Currently, only one (if any) file system may be specified.',
      }),
    ),
    name: Type.Optional(
      Type.String({ description: 'User-provided name for the instance' }),
    ),
    ip: Type.Optional(
      Type.String({ computed: true, description: 'ip address of the instance' }),
    ),
    status: Type.Optional(
      Type.String({ computed: true, description: 'status of the instance' }),
    ),
    id: Type.Optional(
      Type.String({ computed: true, computedOnly: true, description: 'id of the instance' }),
    ),
  },
  { additionalProperties: false },
);

export type InstanceConfig = Static<typeof InstanceConfigSchema>;

export const SshKeyConfigSchema = Type.Object(
  {
    name: Type.String({ minLength: 1, description: 'Name of the SSH key.' }),
    public_key: Type.Optional(
      Type.String({ sensitive: true, description: 'Public key for the SSH key.' }),
    ),
    private_key: Type.Optional(
      Type.String({
        sensitive: true,
        computed: true,
        description:
          'Private key for the SSH key. Only returned when generating a new key pair.',
      }),
    ),
    id: Type.Optional(
      Type.String({
        computed: true,
        computedOnly: true,
        description: 'Unique Identifier (ID) of an SSH key.',
      }),
    ),
  },
  { additionalProperties: false },
);

export type SshKeyConfig = Static<typeof SshKeyConfigSchema>;

export interface ResourceTypeInfo {
  suffix: string;
  description: string;
  schema: TObject;
}

export const RESOURCE_TYPES: Record<ResourceKind, ResourceTypeInfo> = {
  instance: {
    suffix: '_instance',
    description: 'Instance resource',
    schema: InstanceConfigSchema,
  },
  ssh_key: {
    suffix: '_sshkey',
    description: 'SSH key resource',
    schema: SshKeyConfigSchema,
  },
};

/** e.g. "lambdalabs_instance" */
export function resourceTypeName(
  kind: ResourceKind,
  providerTypeName: string = PROVIDER_TYPE_NAME,
): string {
  return providerTypeName + RESOURCE_TYPES[kind].suffix;
}

// =============================================================================
// ATTRIBUTE METADATA
// =============================================================================

export interface AttributeInfo {
  name: string;
  description: string;
  required: boolean;
  /** Server fills it in; may still be set by the caller unless computedOnly */
  computed: boolean;
  computedOnly: boolean;
  sensitive: boolean;
}

export function describeAttributes(schema: TObject): AttributeInfo[] {
  const required = new Set(schema.required ?? []);
  return Object.entries(schema.properties).map(([name, prop]) => ({
    name,
    description: prop.description ?? '',
    required: required.has(name),
    computed: prop.computed === true,
    computedOnly: prop.computedOnly === true,
    sensitive: prop.sensitive === true,
  }));
}

/** Attribute names whose values must never be printed */
export function sensitiveAttributes(kind: ResourceKind): string[] {
  return describeAttributes(RESOURCE_TYPES[kind].schema)
    .filter((a) => a.sensitive)
    .map((a) => a.name);
}

// =============================================================================
// BINDING
// =============================================================================

function decode<T extends TSchema>(
  schema: T,
  typeName: string,
  input: unknown,
): Static<T> {
  if (Value.Check(schema, input)) return input;

  const first = Value.Errors(schema, input).First();
  const where = first?.path || '/';
  throw new ValidationError(
    `Invalid ${typeName} configuration at ${where}: ${first?.message ?? 'unknown error'}`,
    { code: 'INVALID_INPUT', details: { typeName, path: where } },
  );
}

export function bindInstanceConfig(input: unknown): InstanceDesired {
  const config = decode(InstanceConfigSchema, resourceTypeName('instance'), input);
  return {
    regionName: config.region_name,
    instanceTypeName: config.instance_type_name,
    sshKeyNames: config.ssh_key_names,
    fileSystemNames: config.file_system_names,
    name: config.name,
  };
}

export function bindSshKeyConfig(input: unknown): SshKeyDesired {
  const config = decode(SshKeyConfigSchema, resourceTypeName('ssh_key'), input);
  return {
    name: config.name,
    publicKey: config.public_key,
  };
}

export function bindProviderConfig(input: unknown): ProviderConfigInput {
  return decode(ProviderConfigSchema, PROVIDER_TYPE_NAME, input ?? {});
}
