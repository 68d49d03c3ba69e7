import { z } from "zod";
import { APP_VERSION } from "./config";
import { Engine } from "./engine";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError, Server } from "./mcp-sdk";
import { DOCUMENT_TYPES, Question } from "./types";

const QuestionArgsSchema = z.object({
  question: z.string(),
  options: z.array(z.string()).default([]),
  id: z.string().min(1).optional(),
  target_year: z.number().int().optional(),
});

const BatchArgsSchema = z.object({ questions: z.array(QuestionArgsSchema).min(1).max(1000) });

const QueryArgsSchema = z.object({ query: z.string() });

const SearchArgsSchema = z.object({
  query: z.string(),
  target_year: z.number().int().optional(),
  entities: z.array(z.string()).optional(),
  categories: z.array(z.enum(DOCUMENT_TYPES)).optional(),
  top_k: z.number().int().min(1).max(50).optional(),
});

const questionInputSchema = {
  type: "object" as const,
  description: "A multiple-choice question; option letters follow array order (A, B, ...).",
  properties: {
    question: { type: "string", description: "Question text, passage included for reading questions." },
    options: { type: "array", items: { type: "string" }, description: "Option texts without letters." },
    id: { type: "string", description: "Caller's question id, echoed back." },
    target_year: {
      type: "number",
      description: "Year the answer must be valid for; overrides a year found in the question.",
    },
  },
  required: ["question", "options"],
};

const queryInputSchema = {
  type: "object" as const,
  properties: { query: { type: "string", description: "Query text." } },
  required: ["query"],
};

export const TOOLS = [
  {
    name: "process_query",
    description:
      "Screen a question for unsafe intent, route it (READING, STEM or RAG) and, in RAG mode, retrieve supporting chunks.",
    inputSchema: questionInputSchema,
  },
  {
    name: "answer_question",
    description:
      "Answer a multiple-choice question end to end: safety screening, routing, retrieval and LLM answer selection.",
    inputSchema: questionInputSchema,
  },
  {
    name: "answer_batch",
    description:
      "Answer a list of multiple-choice questions; at most MAX_CONCURRENT_QUERIES run at once and answers keep input order.",
    inputSchema: {
      type: "object" as const,
      properties: {
        questions: {
          type: "array",
          items: questionInputSchema,
          description: "Questions to answer; a missing id defaults to the 1-based position.",
        },
      },
      required: ["questions"],
    },
  },
  {
    name: "route_query",
    description: "Classify a question as READING, STEM or RAG and extract year, entities and category hint.",
    inputSchema: queryInputSchema,
  },
  {
    name: "search_knowledge",
    description: "Hybrid BM25 + vector search over the knowledge store, fused with Reciprocal Rank Fusion.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Search text." },
        target_year: { type: "number", description: "Drop chunks not valid in this year." },
        entities: {
          type: "array",
          items: { type: "string" },
          description: "Restrict to chunks mentioning one of these names.",
        },
        categories: {
          type: "array",
          items: { type: "string", enum: [...DOCUMENT_TYPES] },
          description: "Restrict to these document types.",
        },
        top_k: { type: "number", minimum: 1, maximum: 50, description: "Defaults to TOP_K." },
      },
      required: ["query"],
    },
  },
  {
    name: "check_safety",
    description: "Check a query against the unsafe-intent vectors and keyword list.",
    inputSchema: queryInputSchema,
  },
];

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toQuestion(args: z.infer<typeof QuestionArgsSchema>, defaultId = "query"): Question {
  return { id: args.id ?? defaultId, text: args.question, options: args.options };
}

/**
 * Execute one tool against the shared engine. Argument errors become
 * InvalidParams, unknown names MethodNotFound.
 */
export async function callTool(engine: Engine, name: string, args: unknown): Promise<unknown> {
  switch (name) {
    case "process_query": {
      const a = parseArgs(QuestionArgsSchema, args);
      return engine.processor.processQuery(toQuestion(a), a.target_year);
    }
    case "answer_question": {
      const a = parseArgs(QuestionArgsSchema, args);
      return engine.processor.answer(toQuestion(a), a.target_year);
    }
    case "answer_batch": {
      const { questions } = parseArgs(BatchArgsSchema, args);
      return engine.processor.processBatch(
        questions.map((q, i) => ({ question: toQuestion(q, String(i + 1)), targetYear: q.target_year })),
      );
    }
    case "route_query":
      return engine.router.route(parseArgs(QueryArgsSchema, args).query);
    case "search_knowledge": {
      const a = parseArgs(SearchArgsSchema, args);
      return engine.search.run(a.query, {
        targetYear: a.target_year,
        entities: a.entities,
        categories: a.categories,
        topK: a.top_k,
      });
    }
    case "check_safety":
      return engine.guard.check(parseArgs(QueryArgsSchema, args).query);
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Factory for a new MCP Server bound to the shared engine. A fresh server
 * is created per transport session (HTTP mode may hold several); the engine
 * and its loaded artifacts are shared.
 */
export function createServer(engine: Engine): Server {
  const server = new Server(
    { name: "mcq-query-engine", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const result = await callTool(engine, req.params.name, req.params.arguments);
    return { content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }] };
  });

  return server;
}
