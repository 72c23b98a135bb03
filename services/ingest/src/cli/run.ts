import { readFile } from "node:fs/promises";
import { loadConfig, resolveBaseUrl, type Config, type Env } from "../config.js";
import { buildDocuments, metadataFromFlags, readSourceFile, textSource } from "../documents/index.js";
import type { SourceText } from "../documents/index.js";
import { ConfigurationError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { ingestDocuments } from "../pipeline/index.js";
import { RagEngineClient } from "../ragengine/index.js";
import type { JsonValue, RagEngineClientConfig } from "../ragengine/index.js";
import type { CliOptions, Mode } from "./options.js";
import { formatChatResult, formatJson } from "./output.js";

export interface RunContext {
  env?: Env;
  /** Result sink. Defaults to stdout. */
  stdout?: (text: string) => void;
  logger?: Logger;
  now?: () => Date;
  createClient?: ClientFactory;
}

export type ClientFactory = (config: RagEngineClientConfig, logger: Logger) => RagEngineClient;

const defaultClientFactory: ClientFactory = (config, logger) => new RagEngineClient(config, logger);

/** A validated invocation, ready to run against a client. */
type Operation = (client: RagEngineClient) => Promise<JsonValue>;

interface PrepareContext {
  config: Config;
  logger: Logger;
  now: () => Date;
}

function requireIndex(options: CliOptions): string {
  if (!options.index) {
    throw new ConfigurationError(`--index is required for ${options.mode} mode.`);
  }
  return options.index;
}

async function loadSource(options: CliOptions): Promise<SourceText> {
  if (options.file !== undefined && options.text !== undefined) {
    throw new ConfigurationError("Use either --file or --text, not both.");
  }
  if (options.file !== undefined) return readSourceFile(options.file);
  if (options.text !== undefined) return textSource(options.text, options.name);
  throw new ConfigurationError("--file is required for create/update.");
}

async function prepareIngest(
  options: CliOptions,
  mode: "create" | "update",
  { config, logger, now }: PrepareContext,
): Promise<Operation> {
  const indexName = requireIndex(options);
  const source = await loadSource(options);
  const metadata = metadataFromFlags(options.metadata, options.metadataJson);

  const documents = buildDocuments(source, {
    indexName,
    chunking: {
      maxChars: options.maxChars ?? config.chunking.maxChars,
      overlapChars: options.overlapChars ?? config.chunking.overlapChars,
    },
    metadata,
    now,
  });
  logger.info("Document chunked", { filename: source.filename, chunks: documents.length });

  return (client) =>
    ingestDocuments(client, documents, {
      indexName,
      mode,
      allowDuplicates: options.allowDuplicates,
      logger,
    });
}

function prepareList(options: CliOptions): Operation {
  const indexName = requireIndex(options);
  const metadataFilter = metadataFromFlags(options.metadata, options.metadataFilter, "--metadata-filter");

  return (client) =>
    client.listDocuments(indexName, {
      limit: options.limit,
      offset: options.offset,
      maxTextLength: options.maxTextLength,
      metadataFilter,
    });
}

async function resolveQuestion(options: CliOptions): Promise<string> {
  if (options.questionFile !== undefined) {
    try {
      return (await readFile(options.questionFile, "utf-8")).trim();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to read --question-file: ${reason}`);
    }
  }
  return options.question?.trim() ?? "";
}

async function prepareChat(options: CliOptions, { config }: PrepareContext): Promise<Operation> {
  const indexName = requireIndex(options);
  const question = await resolveQuestion(options);
  if (!question) {
    throw new ConfigurationError("Chat mode requires --question or --question-file.");
  }

  const model = options.model?.trim() || config.ragengine.model;

  return (client) =>
    client.chatCompletions({
      indexName,
      model,
      messages: [
        { role: "system", content: options.system },
        { role: "user", content: question },
      ],
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      contextTokenRatio: options.contextTokenRatio,
    });
}

async function prepare(options: CliOptions, context: PrepareContext): Promise<Operation> {
  const mode: Mode = options.mode;
  switch (mode) {
    case "create":
    case "update":
      return prepareIngest(options, mode, context);
    case "list":
      return prepareList(options);
    case "chat":
    case "query":
      return prepareChat(options, context);
    case "indexes":
      return (client) => client.listIndexes();
  }
}

function render(options: CliOptions, result: JsonValue): string {
  if (options.mode === "chat" || options.mode === "query") {
    return formatChatResult(result, { json: options.json, showSources: options.showSources });
  }
  return formatJson(result);
}

/**
 * Validate the invocation, then run it against the RAG engine and print the result.
 * Every configuration problem surfaces before the first request.
 */
export async function runCommand(options: CliOptions, context: RunContext = {}): Promise<JsonValue> {
  const config = loadConfig(context.env ?? process.env);
  const logger =
    context.logger ?? createLogger({ level: options.verbose ? "debug" : config.logLevel });
  const stdout = context.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));

  const operation = await prepare(options, {
    config,
    logger,
    now: context.now ?? (() => new Date()),
  });
  const baseUrl = resolveBaseUrl(options.baseUrl, config);

  const createClient = context.createClient ?? defaultClientFactory;
  const client = createClient(
    {
      baseUrl,
      connectTimeoutMs: (options.connectTimeout ?? config.http.connectTimeoutSeconds) * 1000,
      timeoutMs: (options.timeout ?? config.http.timeoutSeconds) * 1000,
      retries: options.retries ?? config.http.retries,
      apiKey: config.ragengine.apiKey,
    },
    logger,
  );

  logger.debug("Running command", { mode: options.mode, baseUrl });
  try {
    const result = await operation(client);
    stdout(render(options, result));
    return result;
  } finally {
    await client.close();
  }
}
