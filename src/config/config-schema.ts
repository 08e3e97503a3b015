/**
 * Zod schemas for configuration validation
 *
 * The schemas describe what may appear in config.yaml. Every key is optional;
 * missing keys are filled from config-defaults.ts.
 */

import { z } from 'zod';
import { NotificationLevelSchema } from '../notifications/notification-level';

/**
 * Local cache settings
 */
export const CacheSettingsSchema = z.object({
  dir: z.string().min(1).optional().describe('Directory holding downloaded editions'),
  prefix: z
    .string()
    .regex(/^[^/\\]+$/, { message: 'Must not contain path separators' })
    .optional()
    .describe('File name prefix, files are named <prefix>.<YYYY-MM-DD>.mp4'),
  tempDir: z.string().min(1).optional().describe('Directory for partial downloads (same filesystem as dir)'),
  sizeThreshold: z.number().int().positive().optional().describe('Cache size in bytes above which a warning is shown'),
});

/**
 * Remote search API settings
 */
export const RemoteSettingsSchema = z.object({
  searchUrl: z.url().optional().describe('Search endpoint returning the 20:00 editions as JSON'),
  streamVariant: z.string().min(1).optional().describe('Key of the stream to download (e.g. "h264xl")'),
  requestTimeout: z.number().int().positive().optional().describe('Search request timeout in milliseconds'),
  downloadTimeout: z.number().int().positive().optional().describe('Download timeout in milliseconds'),
});

/**
 * Player settings
 */
export const PlayerSettingsSchema = z.object({
  command: z.string().min(1).optional().describe('Command that opens a video file'),
  args: z.array(z.string()).optional().describe('Extra arguments placed before the file path'),
});

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  cache: CacheSettingsSchema.optional().describe('Cache settings'),
  remote: RemoteSettingsSchema.optional().describe('Remote API settings'),
  player: PlayerSettingsSchema.optional().describe('Player settings'),
  notifications: z
    .object({
      consoleMinLevel: NotificationLevelSchema.optional().describe('Minimum notification level for console output'),
    })
    .optional()
    .describe('Notification settings'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate with custom error formatting
 *
 * @param rawConfig - Parsed YAML document
 */
export function validateConfigSafe(rawConfig: unknown): { success: true; data: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
