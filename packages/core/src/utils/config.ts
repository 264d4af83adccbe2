import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';

/**
 * Centralised configuration schema for lattice-tree.
 *
 * Every tunable default is declared here, and can be overridden from the
 * environment or a `.env` file.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Separator used by path addressing (`a.b.0`)
  TREE_PATH_SEPARATOR: z.string().min(1).default('.'),

  // Glyph set used when rendering trees
  TREE_LINE_TYPE: z
    .enum(['ascii', 'ascii-ex', 'ascii-exr', 'ascii-em', 'ascii-emv', 'ascii-emh'])
    .default('ascii-ex'),

  // Column at which the right-hand part of a rendered line ends
  TREE_LINE_MAX_LENGTH: z.coerce.number().int().min(4).default(60),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});
