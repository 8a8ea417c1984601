import fs from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigNotFoundError, ConfigParseError } from '../errors';
import { logger } from '../logger';
import { normalizeDeviceModel, rawDeviceDocumentSchema } from './normalize';
import type { DeviceModel } from './types';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new ConfigNotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Parses a YAML device description. Timestamps are not resolved (CORE schema),
 * so values such as dates or dotted quads stay plain scalars.
 */
export function parseDeviceModel(content: string, source = '<inline>'): DeviceModel {
  let document: unknown;
  try {
    document = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigParseError(source, error.message, { cause: error });
    }
    throw error;
  }

  // An empty document is an empty model
  const result = rawDeviceDocumentSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigParseError(source, describeIssues(result.error), { cause: result.error });
  }
  return normalizeDeviceModel(result.data);
}

export async function loadDeviceModel(filePath: string): Promise<DeviceModel> {
  const content = await readText(filePath);
  const model = parseDeviceModel(content, filePath);
  logger.debug('Loader', `Loaded ${filePath}: ${model.interfaces.length} interface(s), ${model.security.accessLists.length} ACL(s)`);
  return model;
}

/** Reads pre-generated CLI text for deployment. */
export async function loadGeneratedConfig(filePath: string): Promise<string> {
  const content = await readText(filePath);
  logger.debug('Loader', `Read generated configuration ${filePath} (${content.length} bytes)`);
  return content;
}
