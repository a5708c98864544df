#!/usr/bin/env tsx

import { config as loadEnv } from "dotenv";

import {
  DifficultySchema,
  EncodingTypeSchema,
  QuestionRequest,
  QuestionTypeSchema,
  TriviaClient,
  isErrorResponse,
  loadClientConfig,
  type Category,
  type Difficulty,
  type EncodingType,
  type QuestionType,
} from "../src/index";

loadEnv();

type CliOptions = {
  amount: number;
  category?: number;
  type?: QuestionType;
  difficulty?: Difficulty;
  encoding?: EncodingType;
  useSessionToken: boolean;
  listCategories: boolean;
};

function printUsage(): void {
  console.error(
    [
      "Usage: trivia-client [--amount 10] [--category <id>] [--type multiple|boolean]",
      "                     [--difficulty easy|medium|hard] [--encoding html|legacyUrl|rfc3986|base64]",
      "                     [--no-token] [--categories]",
      "",
      "Environment:",
      "  TRIVIA_API_BASE_URL        Service base URL (defaults to https://opentdb.com)",
      "  TRIVIA_ENCODING            Default encoding when --encoding is not given",
      "  TRIVIA_USE_SESSION_TOKEN   Set to false to skip the session token",
      "  LOG_LEVEL                  debug | info | warn | error",
    ].join("\n")
  );
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { amount: 10, useSessionToken: true, listCategories: false };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    const next = argv[i + 1];
    if (current === "--amount" && next !== undefined) {
      opts.amount = Number(next);
      i += 1;
    } else if (current === "--category" && next !== undefined) {
      opts.category = Number(next);
      i += 1;
    } else if (current === "--type" && next !== undefined) {
      const parsed = QuestionTypeSchema.safeParse(next);
      if (!parsed.success) fail(`Unknown question type: ${next}`);
      opts.type = parsed.data;
      i += 1;
    } else if (current === "--difficulty" && next !== undefined) {
      const parsed = DifficultySchema.safeParse(next);
      if (!parsed.success) fail(`Unknown difficulty: ${next}`);
      opts.difficulty = parsed.data;
      i += 1;
    } else if (current === "--encoding" && next !== undefined) {
      const parsed = EncodingTypeSchema.safeParse(next);
      if (!parsed.success) fail(`Unknown encoding: ${next}`);
      opts.encoding = parsed.data;
      i += 1;
    } else if (current === "--no-token") {
      opts.useSessionToken = false;
    } else if (current === "--categories") {
      opts.listCategories = true;
    } else if (current === "--help") {
      printUsage();
      process.exit(0);
    }
  }

  return opts;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadClientConfig();

  const client = TriviaClient.newBuilder()
    .setBaseUrl(config.baseUrl)
    .setEncoding(args.encoding ?? config.encoding)
    .useSessionToken(args.useSessionToken && config.useSessionToken)
    .build();

  const categories = await client.categories.refresh();
  if (args.listCategories) {
    console.log(JSON.stringify(categories, null, 2));
    return;
  }

  let category: Category | null = null;
  if (args.category !== undefined) {
    category = client.categories.fromId(args.category);
    if (!category) fail(`Unknown category id: ${args.category}`);
  }

  const request = QuestionRequest.newBuilder(args.amount)
    .fromCategory(category)
    .ofType(args.type ?? null)
    .ofDifficulty(args.difficulty ?? null)
    .build();

  await client.awaitToken();
  const questions = await client.send(request);

  console.log(JSON.stringify(questions, null, 2));
}

main().catch((error) => {
  console.error("Fetching questions failed:");
  if (isErrorResponse(error)) {
    console.error(`[${error.responseCode.name}] ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
