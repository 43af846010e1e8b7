import fs from 'fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/** Opaque session bundle sent with every upstream request. */
export interface Credentials {
  cookieHeader: string;
}

const cookieListSchema = z.array(
  z.object({
    name: z.string(),
    value: z.string(),
  }).passthrough()
);

const cookieFileSchema = z.union([cookieListSchema, z.string()]);

export function hasCredentials(credentials: Credentials | undefined): credentials is Credentials {
  return !!credentials && credentials.cookieHeader.trim().length > 0;
}

// Format a stored cookie list or raw cookie string into a Cookie header value
export function toCredentials(raw: unknown): Credentials | undefined {
  const parsed = cookieFileSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Unrecognised cookie format, ignoring credentials');
    return undefined;
  }

  const cookieHeader = typeof parsed.data === 'string'
    ? parsed.data.trim()
    : parsed.data
        .filter(cookie => cookie.name)
        .map(cookie => `${cookie.name}=${cookie.value}`)
        .join('; ');

  return cookieHeader ? { cookieHeader } : undefined;
}

// Load cookies for the upstream site; undefined means anonymous access
export async function loadCredentials(filePath: string): Promise<Credentials | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.info(`Cookie file ${filePath} not readable, using anonymous access`, { error: errorMessage(error) });
    return undefined;
  }

  // JSON cookie export, or a raw Cookie header otherwise
  let raw: unknown = content;
  if (/^\s*[[{"]/.test(content)) {
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.warn(`Failed to parse cookie file ${filePath}`, { error: errorMessage(error) });
      return undefined;
    }
  }

  const credentials = toCredentials(raw);
  if (credentials) {
    logger.debug(`Loaded cookies from ${filePath}`);
  } else {
    logger.info(`No cookies found in ${filePath}, using anonymous access`);
  }
  return credentials;
}
