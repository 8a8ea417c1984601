import { z } from 'zod';
import type {
  AclRule,
  AclSpec,
  DeviceInfo,
  DeviceModel,
  InterfaceSpec,
  OspfNetwork,
  OspfSpec,
} from './types';

// Raw document shape as written in YAML. Only structure is enforced here;
// field semantics belong to the validator.
const scalar = z.union([z.string(), z.number(), z.boolean()]).nullish();

const rawCredentialsSchema = z.object({
  username: scalar,
  password: scalar,
  enable_secret: scalar,
});

const rawDeviceSchema = z.object({
  hostname: scalar,
  ip_address: scalar,
  device_type: scalar,
  credentials: rawCredentialsSchema.nullish(),
});

const rawInterfaceSchema = z.object({
  name: scalar,
  description: scalar,
  status: scalar,
  ip_address: scalar,
  subnet_mask: scalar,
});

const rawOspfNetworkSchema = z.object({
  network: scalar,
  wildcard: scalar,
  area: scalar,
});

const rawOspfSchema = z.object({
  enabled: scalar,
  process_id: scalar,
  networks: z.array(rawOspfNetworkSchema).nullish(),
});

const rawAclRuleSchema = z.object({
  action: scalar,
  protocol: scalar,
  source: scalar,
  source_wildcard: scalar,
  destination: scalar,
  destination_port: scalar,
});

const rawAclSchema = z.object({
  name: scalar,
  type: scalar,
  rules: z.array(rawAclRuleSchema).nullish(),
});

export const rawDeviceDocumentSchema = z.object({
  device: rawDeviceSchema.nullish(),
  interfaces: z.array(rawInterfaceSchema).nullish(),
  routing: z.object({ ospf: rawOspfSchema.nullish() }).nullish(),
  security: z.object({ access_lists: z.array(rawAclSchema).nullish() }).nullish(),
});

export type RawDeviceDocument = z.infer<typeof rawDeviceDocumentSchema>;
type Scalar = z.infer<typeof scalar>;

/** Scalars become strings; null, missing and empty values become undefined. */
export function text(value: Scalar): string | undefined {
  if (value === null || value === undefined) return undefined;
  const str = String(value);
  return str === '' ? undefined : str;
}

// YAML 1.1 spellings of true; the loader's CORE schema leaves these as strings
const TRUE_WORDS = ['yes', 'Yes', 'YES', 'on', 'On', 'ON', 'true', 'True', 'TRUE'];

export function flag(value: Scalar): boolean {
  return value === true || (typeof value === 'string' && TRUE_WORDS.includes(value));
}

export function isPositiveInteger(value: string | undefined): value is string {
  return value !== undefined && /^\d+$/.test(value) && Number(value) > 0;
}

/** Process ids are positive integers; anything else counts as absent. */
export function positiveInteger(value: Scalar): string | undefined {
  const str = text(value);
  return isPositiveInteger(str) ? str : undefined;
}

/** Port 0 means no port. */
export function port(value: Scalar): string | undefined {
  const str = text(value);
  return str !== undefined && /^0+$/.test(str) ? undefined : str;
}

function normalizeDevice(raw: RawDeviceDocument['device']): DeviceInfo {
  if (!raw) return {};
  const credentials = raw.credentials
    ? {
        username: text(raw.credentials.username),
        password: text(raw.credentials.password),
        enableSecret: text(raw.credentials.enable_secret),
      }
    : undefined;

  return {
    hostname: text(raw.hostname),
    ipAddress: text(raw.ip_address),
    deviceType: text(raw.device_type),
    credentials,
  };
}

function normalizeInterface(raw: z.infer<typeof rawInterfaceSchema>): InterfaceSpec {
  return {
    name: text(raw.name),
    description: text(raw.description),
    status: text(raw.status),
    ipAddress: text(raw.ip_address),
    subnetMask: text(raw.subnet_mask),
  };
}

function normalizeOspf(raw: z.infer<typeof rawOspfSchema> | null | undefined): OspfSpec | undefined {
  if (!raw) return undefined;
  const networks: OspfNetwork[] = (raw.networks ?? []).map(entry => ({
    network: text(entry.network),
    wildcard: text(entry.wildcard),
    area: text(entry.area),
  }));
  return {
    enabled: flag(raw.enabled),
    processId: positiveInteger(raw.process_id),
    networks,
  };
}

function normalizeRule(raw: z.infer<typeof rawAclRuleSchema>): AclRule {
  return {
    action: text(raw.action),
    protocol: text(raw.protocol),
    source: text(raw.source),
    sourceWildcard: text(raw.source_wildcard),
    destination: text(raw.destination),
    destinationPort: port(raw.destination_port),
  };
}

function normalizeAcl(raw: z.infer<typeof rawAclSchema>): AclSpec {
  return {
    name: text(raw.name),
    type: text(raw.type),
    rules: (raw.rules ?? []).map(normalizeRule),
  };
}

/**
 * Single defaulting pass from the raw YAML document to the model.
 * Missing sections become empty, input order is kept as-is.
 */
export function normalizeDeviceModel(raw: RawDeviceDocument): DeviceModel {
  return {
    device: normalizeDevice(raw.device),
    interfaces: (raw.interfaces ?? []).map(normalizeInterface),
    routing: {
      ospf: normalizeOspf(raw.routing?.ospf),
    },
    security: {
      accessLists: (raw.security?.access_lists ?? []).map(normalizeAcl),
    },
  };
}
