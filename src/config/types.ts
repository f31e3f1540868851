import type { z } from 'zod';

import type { ConfigSchema } from '../schemas/config.js';

export type Config = z.infer<typeof ConfigSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

export type CliRequest =
  | { kind: 'search'; config: Config }
  | { kind: 'help' };

export interface RunSummary {
  matchCount: number;
}
