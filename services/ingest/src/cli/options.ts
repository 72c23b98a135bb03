import { Command, Option } from "commander";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const MODES = ["create", "update", "list", "chat", "query", "indexes"] as const;
export type Mode = (typeof MODES)[number];

const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((v) => (v === undefined ? undefined : Number(v)), schema.optional());

const numberOr = (schema: z.ZodNumber, fallback: number) =>
  z.preprocess((v) => (v === undefined ? fallback : Number(v)), schema);

const CliOptionsSchema = z.object({
  mode: z.enum(MODES),
  index: z.string().trim().min(1).optional(),
  file: z.string().optional(),
  text: z.string().optional(),
  name: z.string().optional(),
  baseUrl: z.string().optional(),

  // Chunking; unset values fall back to config
  maxChars: optionalNumber(z.number().int().positive()),
  overlapChars: optionalNumber(z.number().int().nonnegative()),

  metadata: z.array(z.string()),
  metadataJson: z.string().optional(),
  allowDuplicates: z.boolean(),

  // List mode
  limit: numberOr(z.number().int().min(1).max(100), 10),
  offset: numberOr(z.number().int().nonnegative(), 0),
  maxTextLength: numberOr(z.number().int().positive(), 1000),
  metadataFilter: z.string().optional(),

  // Chat mode
  question: z.string().optional(),
  questionFile: z.string().optional(),
  system: z.string(),
  model: z.string().optional(),
  temperature: numberOr(z.number().min(0).max(2), 0.7),
  maxTokens: numberOr(z.number().int().positive(), 2048),
  contextTokenRatio: numberOr(z.number().min(0).max(1), 0.5),
  json: z.boolean(),
  showSources: z.boolean(),

  // HTTP; unset values fall back to config
  connectTimeout: optionalNumber(z.number().positive()),
  timeout: optionalNumber(z.number().positive()),
  retries: optionalNumber(z.number().int().min(1)),

  verbose: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildProgram(): Command {
  return new Command()
    .name("ragengine-ingest")
    .description("Ingest text documents into a RAG engine index, list them, or ask questions against it")
    .addOption(
      new Option("--mode <mode>", "create | update | list | chat | query | indexes")
        .choices(MODES)
        .default("create"),
    )
    .option("--index <name>", "index name (e.g. rag_index)")
    .option("--file <path>", "text file to ingest (create/update)")
    .option("--text <text>", "raw text to ingest instead of --file")
    .option("--name <name>", "logical filename for --text (default: pasted-text.md)")
    .option("--base-url <url>", "RAG engine base URL (default: $RAGENGINE_URL, then http://$INGRESS_IP)")
    .option("--max-chars <n>", "max characters per chunk (default 3000)")
    .option("--overlap-chars <n>", "characters repeated between consecutive chunks (default 200)")
    .option("--metadata <key=value>", "metadata attached to every chunk (repeatable)", collect, [])
    .option("--metadata-json <json>", "JSON object merged into chunk metadata; wins over --metadata")
    .option("--allow-duplicates", "create mode: ingest even if the filename is already indexed", false)
    .option("--limit <n>", "list mode: max documents to return (1-100)")
    .option("--offset <n>", "list mode: offset")
    .option("--max-text-length <n>", "list mode: max text length returned per document")
    .option("--metadata-filter <json>", "list mode: JSON object to filter by metadata")
    .option("--question <text>", "chat mode: user question")
    .option("--question-file <path>", "chat mode: read the question from a file")
    .option("--system <text>", "chat mode: system message", DEFAULT_SYSTEM_PROMPT)
    .option("--model <name>", "chat mode: model name (default: $RAGENGINE_MODEL or example_model)")
    .option("--temperature <n>", "chat mode: sampling temperature")
    .option("--max-tokens <n>", "chat mode: max tokens to generate")
    .option("--context-token-ratio <n>", "chat mode: share of context tokens reserved for retrieved documents")
    .option("--json", "chat mode: print the full JSON response", false)
    .option("--show-sources", "chat mode: print source_nodes when returned", false)
    .option("--connect-timeout <seconds>", "connect timeout (default 5)")
    .option("--timeout <seconds>", "total request timeout (default 60)")
    .option("--retries <n>", "attempts per request (default 3)")
    .option("--verbose", "debug logging", false)
    .exitOverride()
    .configureOutput({ writeErr: () => {} });
}

/**
 * Parse argv (as in process.argv) into validated options.
 */
export function parseCliArgs(argv: string[], program: Command = buildProgram()): CliOptions {
  program.parse(argv);
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${toFlag(i.path.join("."))}: ${i.message}`);
    throw new ConfigurationError(`Invalid arguments: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
