import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Client } from '../types/storage.js';
import { SUPPORTED_CONNECTOR_TYPES } from './constants.js';

/**
 * Connector entry in the file named by CONNECTORS_FILE
 */
export const connectorDefinitionSchema = z.object({
  type: z.enum(SUPPORTED_CONNECTOR_TYPES),
  id: z.string().min(1),
  name: z.string().min(1),
  config: z.record(z.unknown()),
});

export type ConnectorDefinition = z.infer<typeof connectorDefinitionSchema>;

/**
 * Client entry in the file named by CLIENTS_FILE
 */
export const clientDefinitionSchema = z.object({
  id: z.string().min(1),
  secret: z.string().default(''),
  redirectURIs: z.array(z.string().url()).min(1),
  trustedPeers: z.array(z.string()).default([]),
  public: z.boolean().default(false),
  name: z.string().default(''),
  logoURL: z.string().default(''),
});

function readJSONFile(path: string): unknown {
  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`config: ${path} is not valid JSON`, { cause: err });
  }
}

function parseList<S extends z.ZodTypeAny>(path: string, schema: S): z.output<S>[] {
  const result = z.array(schema).safeParse(readJSONFile(path));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`config: ${path}: ${details}`, { cause: result.error });
  }
  return result.data;
}

export function loadConnectorDefinitions(path: string): ConnectorDefinition[] {
  return parseList(path, connectorDefinitionSchema);
}

export function loadClientDefinitions(path: string): Client[] {
  return parseList(path, clientDefinitionSchema);
}
