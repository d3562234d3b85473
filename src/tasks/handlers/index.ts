import type { CompletionClient } from "../../llm/completions.js";
import type { Logger } from "../../logger.js";
import { silentLogger } from "../../logger.js";
import { createHandlerRegistry, type HandlerRegistry, type TaskHandler } from "../handlerRegistry.js";
import type { AnswerStore } from "./answerStore.js";
import { ECHO_TASK, echoHandler } from "./echo.js";
import { createSolveQuestionHandler, SOLVE_QUESTION_TASK } from "./solveQuestion.js";

export interface HandlerDeps {
  answers: AnswerStore;
  /** Without an LLM client question:solve is not registered and such tasks dead-letter as unknown. */
  completions: CompletionClient | null;
  logger?: Logger;
}

export function buildHandlerRegistry(deps: HandlerDeps): HandlerRegistry {
  const logger = deps.logger ?? silentLogger;
  const entries: Array<readonly [string, TaskHandler]> = [[ECHO_TASK, echoHandler]];

  if (deps.completions) {
    entries.push([SOLVE_QUESTION_TASK, createSolveQuestionHandler({ completions: deps.completions, answers: deps.answers })]);
  } else {
    logger.warn(`no LLM client configured; ${SOLVE_QUESTION_TASK} is not registered`);
  }

  return createHandlerRegistry(entries);
}
