/**
 * Client configuration: validation and endpoint resolution.
 */

import { z } from "zod";
import { DokuWikiConfigError } from "./errors.js";
import type { DokuWikiConfig } from "./types.js";

const XMLRPC_PATH = "/lib/exe/xmlrpc.php";
const URL_PATTERN = /^(https?):\/\/(.+)$/;

export const DokuWikiConfigSchema = z.object({
  url: z.string().min(1),
  user: z.string(),
  password: z.string(),
  cookieAuth: z.boolean().default(false),
  debug: z.boolean().default(false),
  transport: z
    .object({
      headers: z.record(z.string()).optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .default({}),
});

export type ResolvedConfig = z.infer<typeof DokuWikiConfigSchema> & {
  /** XML-RPC endpoint, credentials included in URI mode. */
  endpoint: string;
};

/**
 * Validate `config` and derive the XML-RPC endpoint. Throws
 * DokuWikiConfigError; never touches the network.
 */
export function resolveConfig(config: DokuWikiConfig): ResolvedConfig {
  const result = DokuWikiConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new DokuWikiConfigError(`invalid configuration: ${issues.join("; ")}`);
  }

  const parsed = result.data;
  const match = URL_PATTERN.exec(parsed.url.trim());
  if (!match) {
    throw new DokuWikiConfigError(`invalid url: '${parsed.url}'`);
  }
  const [, scheme, rest] = match;
  let endpoint = `${scheme}://${rest.replace(/\/+$/, "")}${XMLRPC_PATH}`;

  if (!parsed.cookieAuth) {
    endpoint += `?${new URLSearchParams({ u: parsed.user, p: parsed.password })}`;
  }

  return { ...parsed, endpoint };
}
