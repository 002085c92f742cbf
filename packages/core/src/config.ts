import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { AddressSchema } from './schemas.js';

export const DEFAULT_PORT = 18790;

export const ConfigSchema = z.object({
  contract: AddressSchema,
  verificationKeyPath: z.string().optional(),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  auditLogPath: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Get the semdrop home directory ($SEMDROP_HOME or ~/.semdrop)
 */
export function getHomeDir(): string {
  return process.env['SEMDROP_HOME'] ?? join(homedir(), '.semdrop');
}

export function getConfigPath(home: string = getHomeDir()): string {
  return join(home, 'config.json');
}

export async function loadConfig(path: string = getConfigPath()): Promise<Config> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error('semdrop is not initialized. Run "semdrop init --contract <address>" first.');
    }
    throw error;
  }
  return ConfigSchema.parse(JSON.parse(content));
}

export async function saveConfig(config: ConfigInput, path: string = getConfigPath()): Promise<Config> {
  const parsed = ConfigSchema.parse(config);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(parsed, null, 2), 'utf8');
  return parsed;
}
