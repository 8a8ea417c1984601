import fs from 'fs/promises';
import path from 'path';
import { logger } from '../logger';
import { isPositiveInteger, port } from '../device/normalize';
import type { AclRule, AclSpec, DeviceModel, InterfaceSpec, OspfSpec } from '../device/types';

const HEADER_MARKER = '! Generated Configuration';
const UNKNOWN_DEVICE = 'Unknown-Device';
const DEFAULT_HOSTNAME = 'default-hostname';
const DEFAULT_SOURCE_WILDCARD = '0.0.0.0';
const DEFAULT_DESTINATION = 'any';

// Generation tolerates drafts: incomplete entries are skipped, never reported.
// Reporting them is the validator's job.

export function hostnameLines(model: DeviceModel): string[] {
  return [`hostname ${model.device.hostname ?? DEFAULT_HOSTNAME}`];
}

function interfaceBlock(iface: InterfaceSpec): string[] {
  if (!iface.name) return [];

  const lines = [
    `interface ${iface.name}`,
    ` description ${iface.description ?? `Interface ${iface.name}`}`,
    iface.status === 'up' ? ' no shutdown' : ' shutdown',
  ];
  if (iface.ipAddress && iface.subnetMask) {
    lines.push(` ip address ${iface.ipAddress} ${iface.subnetMask}`);
  }
  lines.push('!');
  return lines;
}

export function interfaceLines(model: DeviceModel): string[] {
  return model.interfaces.flatMap(interfaceBlock);
}

export function ospfLines(ospf: OspfSpec | undefined): string[] {
  // No process id, no router block
  if (!ospf?.enabled || !isPositiveInteger(ospf.processId)) return [];

  const lines = [`router ospf ${ospf.processId}`];
  for (const entry of ospf.networks) {
    if (entry.network && entry.wildcard && entry.area !== undefined) {
      lines.push(` network ${entry.network} ${entry.wildcard} area ${entry.area}`);
    }
  }
  lines.push('!');
  return lines;
}

function extendedRuleLine(aclName: string, rule: AclRule): string | undefined {
  if (!rule.action || !rule.protocol || !rule.source) return undefined;

  const parts = [
    `access-list ${aclName}`,
    rule.action,
    rule.protocol,
    rule.source,
    rule.sourceWildcard ?? DEFAULT_SOURCE_WILDCARD,
    rule.destination ?? DEFAULT_DESTINATION,
  ];
  const destinationPort = port(rule.destinationPort);
  if (destinationPort) {
    parts.push(`eq ${destinationPort}`);
  }
  return parts.join(' ');
}

function aclBlock(acl: AclSpec): string[] {
  const name = acl.name;
  if (!name || !acl.type) return [];
  // TODO: standard ACLs have no rule rendering yet; pending a decision on the
  // numbered vs. named form they should take.
  if (acl.type !== 'extended') return [];

  return acl.rules
    .map(rule => extendedRuleLine(name, rule))
    .filter((line): line is string => line !== undefined);
}

export function aclLines(model: DeviceModel): string[] {
  return model.security.accessLists.flatMap(aclBlock);
}

function section(lines: string[]): string {
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

// The interface slot always ends in a newline, even with nothing in it
function interfaceSection(lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

/**
 * Renders the model as Cisco IOS configuration text. Sections always appear in
 * the same order (hostname, interfaces, OSPF, ACLs) and an empty section still
 * keeps its slot as a blank line, so output is byte-stable for a given model.
 */
export function generateConfig(model: DeviceModel): string {
  const parts = [
    HEADER_MARKER,
    `! Device: ${model.device.hostname ?? UNKNOWN_DEVICE}`,
    '!',
    section(hostnameLines(model)),
    interfaceSection(interfaceLines(model)),
    section(ospfLines(model.routing.ospf)),
    section(aclLines(model)),
    'end',
  ];
  return parts.join('\n');
}

export async function writeGeneratedConfig(outputPath: string, config: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, config, 'utf-8');
  logger.info('Generator', `Configuration saved to ${outputPath}`);
}
