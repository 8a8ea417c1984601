import { isValidIPv4, isValidSubnetMask } from '../net/ipv4';
import type { AclSpec, DeviceModel, InterfaceSpec } from '../device/types';
import { DEFAULT_DEVICE_TYPE } from '../device/types';
import { isPositiveInteger } from '../device/normalize';

export interface ValidationReport {
  errors: string[];
  warnings: string[];
}

const ACL_TYPES = ['standard', 'extended'];
const RULE_ACTIONS = ['permit', 'deny'];
const COMMON_PROTOCOLS = ['tcp', 'udp', 'ip', 'icmp'];

type Findings = ValidationReport;

function validateDeviceInfo(model: DeviceModel, findings: Findings) {
  const device = model.device;

  if (!device.hostname) {
    findings.errors.push('Device hostname is required');
  }

  if (!device.ipAddress) {
    findings.errors.push('Device IP address is required');
  } else if (!isValidIPv4(device.ipAddress)) {
    findings.errors.push(`Invalid IP address: ${device.ipAddress}`);
  }

  if (!device.deviceType) {
    findings.warnings.push(`Device type not specified, defaulting to ${DEFAULT_DEVICE_TYPE}`);
  }
}

function validateInterface(iface: InterfaceSpec, index: number, findings: Findings) {
  const label = iface.name ?? String(index);

  if (!iface.name) {
    findings.errors.push(`Interface ${index}: name is required`);
  }
  if (!iface.description) {
    findings.errors.push(`Interface ${label}: description is required`);
  }
  if (!iface.status) {
    findings.errors.push(`Interface ${label}: status is required`);
  }

  if (iface.ipAddress !== undefined) {
    if (!isValidIPv4(iface.ipAddress)) {
      findings.errors.push(`Interface ${label}: Invalid IP address ${iface.ipAddress}`);
    }
    if (iface.subnetMask === undefined) {
      findings.errors.push(`Interface ${label}: Subnet mask required when IP is configured`);
    } else if (!isValidSubnetMask(iface.subnetMask)) {
      findings.errors.push(`Interface ${label}: Invalid subnet mask`);
    }
  }
}

function validateInterfaces(model: DeviceModel, findings: Findings) {
  if (model.interfaces.length === 0) {
    findings.warnings.push('No interfaces configured');
    return;
  }
  model.interfaces.forEach((iface, index) => validateInterface(iface, index, findings));
}

function validateRouting(model: DeviceModel, findings: Findings) {
  const ospf = model.routing.ospf;
  if (!ospf?.enabled) return;

  if (!isPositiveInteger(ospf.processId)) {
    findings.errors.push('OSPF process ID is required when OSPF is enabled');
  }
  if (ospf.networks.length === 0) {
    findings.warnings.push('OSPF enabled but no networks configured');
  }

  ospf.networks.forEach((entry, index) => {
    if (!isValidIPv4(entry.network)) {
      findings.errors.push(`OSPF network ${index}: Invalid network address`);
    }
    if (!isValidIPv4(entry.wildcard)) {
      findings.errors.push(`OSPF network ${index}: Invalid wildcard mask`);
    }
    if (entry.area === undefined) {
      findings.errors.push(`OSPF network ${index}: Area is required`);
    }
  });
}

function validateAcl(acl: AclSpec, index: number, findings: Findings) {
  const label = acl.name ?? String(index);

  if (!acl.name) {
    findings.errors.push('ACL name is required');
  }
  if (!acl.type || !ACL_TYPES.includes(acl.type)) {
    findings.errors.push(`ACL ${label}: Type must be 'standard' or 'extended'`);
  }

  for (const rule of acl.rules) {
    if (!rule.action || !RULE_ACTIONS.includes(rule.action)) {
      findings.errors.push(`ACL ${label}: Rule action must be 'permit' or 'deny'`);
    }

    if (!rule.protocol) {
      findings.errors.push(`ACL ${label}: Rule protocol is required`);
    } else if (!COMMON_PROTOCOLS.includes(rule.protocol)) {
      findings.warnings.push(`ACL ${label}: Uncommon protocol ${rule.protocol}`);
    }

    if (!rule.source) {
      findings.errors.push(`ACL ${label}: Rule source is required`);
    }
  }
}

function validateSecurity(model: DeviceModel, findings: Findings) {
  model.security.accessLists.forEach((acl, index) => validateAcl(acl, index, findings));
}

/**
 * Runs every check against every entry and returns all findings.
 * Never throws and never touches the model.
 */
export function validateDevice(model: DeviceModel): ValidationReport {
  const findings: Findings = { errors: [], warnings: [] };
  validateDeviceInfo(model, findings);
  validateInterfaces(model, findings);
  validateRouting(model, findings);
  validateSecurity(model, findings);
  return findings;
}

export function isValid(report: ValidationReport): boolean {
  return report.errors.length === 0;
}

export function formatReport(report: ValidationReport, source: string): string {
  const lines = [`=== Validation Results for ${source} ===`];

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:');
    report.warnings.forEach(warning => lines.push(`  ⚠ ${warning}`));
  }

  if (report.errors.length > 0) {
    lines.push('', 'Errors:');
    report.errors.forEach(error => lines.push(`  ✗ ${error}`));
    lines.push('', `✗ Validation FAILED: ${report.errors.length} error(s) found`);
  } else {
    lines.push('', '✓ Validation PASSED: Configuration is valid');
  }

  return lines.join('\n');
}
