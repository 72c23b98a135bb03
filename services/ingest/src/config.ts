import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const ConfigSchema = z.object({
  // RAG engine endpoint sources, resolved by resolveBaseUrl()
  ragengine: z.object({
    url: z.string().optional(),
    ingressIp: z.string().optional(),
    model: z.string().min(1).default("example_model"),
    apiKey: z.string().optional(),
  }),

  // HTTP settings
  http: z.object({
    connectTimeoutSeconds: z.number().positive().default(5),
    timeoutSeconds: z.number().positive().default(60),
    retries: z.number().int().min(1).default(3),
  }),

  // Chunking settings
  chunking: z.object({
    maxChars: z.number().int().positive().default(3000),
    overlapChars: z.number().int().nonnegative().default(200),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

function numberFromEnv(raw: string | undefined): number | undefined {
  return raw ? Number(raw) : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

export function loadConfig(env: Env = process.env): Config {
  const parsed = ConfigSchema.safeParse({
    ragengine: {
      url: env.RAGENGINE_URL || undefined,
      ingressIp: env.INGRESS_IP || undefined,
      model: env.RAGENGINE_MODEL || undefined,
      apiKey: env.RAGENGINE_API_KEY || undefined,
    },
    http: {
      connectTimeoutSeconds: numberFromEnv(env.RAGENGINE_CONNECT_TIMEOUT),
      timeoutSeconds: numberFromEnv(env.RAGENGINE_TIMEOUT),
      retries: numberFromEnv(env.RAGENGINE_RETRIES),
    },
    chunking: {
      maxChars: numberFromEnv(env.CHUNK_MAX_CHARS),
      overlapChars: numberFromEnv(env.CHUNK_OVERLAP_CHARS),
    },
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** First value that is neither undefined nor blank. */
export function firstNonEmpty(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((c) => c !== undefined && c.trim() !== "")?.trim();
}

/**
 * Base URL precedence: explicit flag, then $RAGENGINE_URL, then http://$INGRESS_IP.
 * Always returned with a trailing slash so relative endpoint paths append to it.
 */
export function resolveBaseUrl(flag: string | undefined, config: Config): string {
  const ingress = firstNonEmpty(config.ragengine.ingressIp);
  const baseUrl = firstNonEmpty(
    flag,
    config.ragengine.url,
    ingress ? `http://${ingress}` : undefined,
  );

  if (!baseUrl) {
    throw new ConfigurationError(
      "Missing base URL. Provide --base-url or set $RAGENGINE_URL, or set $INGRESS_IP.",
    );
  }
  if (!URL.canParse(baseUrl)) {
    throw new ConfigurationError(`Invalid base URL: ${baseUrl}`);
  }
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}
