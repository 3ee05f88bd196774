import { z } from 'zod';
import { LOG_LEVELS } from '@/types/logLevel';
import { isValidDeviceId } from '@/domain/stack/wiringMap';
import type { MediaStackServerConfig, StackConfig } from '@/domain/config/types';

// Not trimmed: keys that differ only by whitespace must not collapse into one.
const deviceIdSchema = z
  .string()
  .refine(isValidDeviceId, { message: 'expected an entity id like media_player.tv' });

const logLevelSchema = z.enum(LOG_LEVELS);

export const wiringMapSchema = z.record(deviceIdSchema, z.record(z.string().min(1), deviceIdSchema));

export const stackConfigSchema = z.object({
  id: z
    .string()
    .trim()
    .regex(/^[a-z0-9_-]+$/, 'expected lowercase letters, digits, "-" or "_"')
    .optional(),
  name: z.string().trim().min(1),
  mapping: wiringMapSchema,
});

export const serverConfigSchema = z.object({
  system: z
    .object({
      logging: z
        .object({
          level: logLevelSchema.default('info'),
          json: z.boolean().default(false),
        })
        .default({}),
      homeAssistant: z
        .object({
          url: z.string().default('ws://homeassistant.local:8123/api/websocket'),
          token: z.string().default(''),
        })
        .default({}),
    })
    .default({}),
  stacks: z.array(stackConfigSchema).default([]),
  updatedAt: z.string().optional(),
});

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'media_stack';
}

/**
 * Validates a parsed config document and fills defaults.
 */
export function parseServerConfig(input: unknown): MediaStackServerConfig {
  const result = serverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  const stacks: StackConfig[] = result.data.stacks.map((stack) => ({
    id: stack.id ?? slugify(stack.name),
    name: stack.name,
    mapping: stack.mapping,
  }));
  const ids = new Set<string>();
  for (const stack of stacks) {
    if (ids.has(stack.id)) {
      throw new ConfigValidationError([`stacks: duplicate stack id ${stack.id}`]);
    }
    ids.add(stack.id);
  }
  return {
    system: result.data.system,
    stacks,
    updatedAt: result.data.updatedAt,
  };
}
