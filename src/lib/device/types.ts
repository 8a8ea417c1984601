export const DEFAULT_DEVICE_TYPE = 'cisco_ios';

export type InterfaceStatus = 'up' | 'down';
export type AclType = 'standard' | 'extended';
export type AclAction = 'permit' | 'deny';

export interface DeviceCredentials {
  username?: string;
  password?: string;
  enableSecret?: string;
}

export interface DeviceInfo {
  hostname?: string;
  ipAddress?: string;
  deviceType?: string; // absent means DEFAULT_DEVICE_TYPE at deploy time
  credentials?: DeviceCredentials;
}

/**
 * One physical or logical interface. `status`, ACL `type` and rule `action`
 * keep whatever string the document declared; the validator enforces the
 * enumerations, the generator only compares against them.
 */
export interface InterfaceSpec {
  name?: string;
  description?: string;
  status?: string;
  ipAddress?: string;
  subnetMask?: string;
}

export interface OspfNetwork {
  network?: string;
  wildcard?: string;
  area?: string;
}

export interface OspfSpec {
  enabled: boolean;
  processId?: string;
  networks: readonly OspfNetwork[];
}

export interface AclRule {
  action?: string;
  protocol?: string;
  source?: string;
  sourceWildcard?: string;
  destination?: string;
  destinationPort?: string;
}

export interface AclSpec {
  name?: string;
  type?: string;
  rules: readonly AclRule[];
}

export interface DeviceModel {
  device: DeviceInfo;
  interfaces: readonly InterfaceSpec[];
  routing: {
    ospf?: OspfSpec;
  };
  security: {
    accessLists: readonly AclSpec[];
  };
}
