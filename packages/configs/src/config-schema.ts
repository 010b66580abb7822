/**
 * Shape of the merged TOML configuration. Tables other than those below are
 * ignored here.
 */
import { z } from 'zod';

export const linkSchema = z.object({
  link: z.string().url(),
  description: z.string().default(''),
  aliases: z.array(z.string()).default([]),
});

export const configSchema = z.object({
  links: z.record(linkSchema).default({}),
});

export type LinkConfig = z.infer<typeof linkSchema>;
export type Config = z.infer<typeof configSchema>;
