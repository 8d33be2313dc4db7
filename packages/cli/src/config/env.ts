import { z } from "zod";
import { DokuWikiConfigError } from "dokuwiki-rpc";
import type { DokuWikiConfig } from "dokuwiki-rpc";

const Switch = z
  .string()
  .optional()
  .transform((value) => value === "1" || value?.toLowerCase() === "true");

const EnvSchema = z.object({
  DOKUWIKI_URL: z.string().min(1),
  DOKUWIKI_USER: z.string().min(1),
  DOKUWIKI_PASSWORD: z.string(),
  DOKUWIKI_COOKIE_AUTH: Switch,
  DOKUWIKI_DEBUG: Switch,
  DOKUWIKI_TIMEOUT_MS: z
    .string()
    .regex(/^[1-9]\d*$/, "expected a positive whole number")
    .transform(Number)
    .optional(),
});

/**
 * Connection settings from the environment. URL checks happen later, in
 * the client.
 */
export function readConnectionConfig(env: NodeJS.ProcessEnv = process.env): DokuWikiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new DokuWikiConfigError(`invalid environment: ${issues.join("; ")}`);
  }

  const { data } = parsed;
  return {
    url: data.DOKUWIKI_URL,
    user: data.DOKUWIKI_USER,
    password: data.DOKUWIKI_PASSWORD,
    cookieAuth: data.DOKUWIKI_COOKIE_AUTH,
    debug: data.DOKUWIKI_DEBUG,
    transport: data.DOKUWIKI_TIMEOUT_MS === undefined ? undefined : { timeoutMs: data.DOKUWIKI_TIMEOUT_MS },
  };
}
