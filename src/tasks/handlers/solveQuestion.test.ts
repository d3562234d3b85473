import OpenAI from "openai";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { CompletionClient, CompletionRequest } from "../../llm/completions.js";
import { silentLogger } from "../../logger.js";
import type { HandlerContext } from "../handlerRegistry.js";
import type { ProgressInput } from "../progress.js";
import { createTempStore, type TempStore } from "../test-utils.js";
import { SqliteAnswerStore } from "./answerStore.js";
import { buildHandlerRegistry } from "./index.js";
import { buildSolvePrompt, createSolveQuestionHandler } from "./solveQuestion.js";

class FakeCompletions implements CompletionClient {
  readonly model = "test-model";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (req: CompletionRequest) => Promise<string>) {}

  complete(req: CompletionRequest): Promise<string> {
    this.requests.push(req);
    return this.reply(req);
  }
}

function makeContext(taskId = "task-1") {
  const progress: ProgressInput[] = [];
  const ctx: HandlerContext = {
    taskId,
    taskType: "question:solve",
    attempt: 0,
    workerId: "w-0",
    signal: new AbortController().signal,
    reportProgress: (u) => progress.push(u),
    logger: silentLogger,
  };
  return { ctx, progress };
}

describe("buildSolvePrompt", () => {
  it("puts the subject above the question", () => {
    expect(buildSolvePrompt({ question: "What is 2+2?", subject: "Arithmetic" })).toBe(
      "Subject: Arithmetic\n\nQuestion:\nWhat is 2+2?"
    );
  });

  it("omits the subject line when there is none", () => {
    expect(buildSolvePrompt({ question: "What is 2+2?" })).toBe("Question:\nWhat is 2+2?");
  });
});

describe("question:solve handler", () => {
  let store: TempStore;
  let answers: SqliteAnswerStore;

  beforeEach(() => {
    store = createTempStore();
    answers = new SqliteAnswerStore(store.db);
  });

  afterEach(() => {
    store.cleanup();
  });

  it("stores the trimmed answer and reports progress", async () => {
    const completions = new FakeCompletions(async () => "  Four.  \n");
    const handler = createSolveQuestionHandler({ completions, answers, now: () => 42 });
    const { ctx, progress } = makeContext();

    const outcome = await handler.process({ question: "  What is 2+2? ", subject: "Arithmetic" }, ctx);

    expect(outcome).toEqual({ kind: "success" });
    expect(completions.requests[0]?.user).toBe("Subject: Arithmetic\n\nQuestion:\nWhat is 2+2?");
    expect(completions.requests[0]?.signal).toBe(ctx.signal);
    expect(answers.get("task-1")).toEqual({
      taskId: "task-1",
      question: "What is 2+2?",
      subject: "Arithmetic",
      answer: "Four.",
      model: "test-model",
      createdAtMs: 42,
    });
    expect(progress.map((p) => p.stage)).toEqual(["generating", "answered"]);
  });

  it("does not call the LLM again for a task that already has an answer", async () => {
    answers.save({ taskId: "task-1", question: "q", subject: null, answer: "a", model: "m", createdAtMs: 1 });
    const completions = new FakeCompletions(async () => "never used");
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "q" }, makeContext().ctx);

    expect(outcome).toEqual({ kind: "success" });
    expect(completions.requests).toHaveLength(0);
    expect(answers.get("task-1")?.answer).toBe("a");
  });

  it("rejects a blank question as invalid", async () => {
    const completions = new FakeCompletions(async () => "unused");
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "   " }, makeContext().ctx);

    expect(outcome).toEqual({
      kind: "fatal-failure",
      reason: "invalid payload: question: String must contain at least 1 character(s)",
    });
  });

  it("retries transport failures", async () => {
    const completions = new FakeCompletions(async () => {
      throw new Error("socket hang up");
    });
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "q" }, makeContext().ctx);

    expect(outcome).toEqual({ kind: "retryable-failure", reason: "LLM request failed: socket hang up" });
  });

  it("fails fatally when the provider rejects the request", async () => {
    const completions = new FakeCompletions(async () => {
      throw new OpenAI.BadRequestError(400, undefined, "bad request", undefined);
    });
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "q" }, makeContext().ctx);

    expect(outcome.kind).toBe("fatal-failure");
    expect(outcome.kind === "fatal-failure" && outcome.reason).toMatch(/^LLM rejected request: .*bad request/);
  });

  it("retries rate limits", async () => {
    const completions = new FakeCompletions(async () => {
      throw new OpenAI.RateLimitError(429, undefined, "slow down", undefined);
    });
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "q" }, makeContext().ctx);

    expect(outcome.kind).toBe("retryable-failure");
  });

  it("retries an empty answer", async () => {
    const completions = new FakeCompletions(async () => "   ");
    const handler = createSolveQuestionHandler({ completions, answers });

    const outcome = await handler.process({ question: "q" }, makeContext().ctx);

    expect(outcome).toEqual({ kind: "retryable-failure", reason: "LLM returned empty answer" });
    expect(answers.get("task-1")).toBeNull();
  });

  it("truncates very long answers", async () => {
    const completions = new FakeCompletions(async () => "x".repeat(9_000));
    const handler = createSolveQuestionHandler({ completions, answers });

    await handler.process({ question: "q" }, makeContext().ctx);

    expect(answers.get("task-1")?.answer).toHaveLength(8_000);
  });
});

describe("buildHandlerRegistry", () => {
  let store: TempStore;

  beforeEach(() => {
    store = createTempStore();
  });

  afterEach(() => {
    store.cleanup();
  });

  it("registers only echo without an LLM client", () => {
    const registry = buildHandlerRegistry({ answers: new SqliteAnswerStore(store.db), completions: null });
    expect(registry.types()).toEqual(["echo"]);
    expect(registry.resolve("question:solve")).toBeUndefined();
  });

  it("registers question:solve when an LLM client is given", () => {
    const registry = buildHandlerRegistry({
      answers: new SqliteAnswerStore(store.db),
      completions: new FakeCompletions(async () => "ok"),
    });
    expect(registry.types()).toEqual(["echo", "question:solve"]);
  });
});
