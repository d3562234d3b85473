import type { TasksDb } from "../db.js";

export interface StoredAnswer {
  taskId: string;
  question: string;
  subject: string | null;
  answer: string;
  model: string;
  createdAtMs: number;
}

export interface AnswerStore {
  get(taskId: string): StoredAnswer | null;
  /** First write wins, so a redelivered task cannot overwrite a stored answer. */
  save(answer: StoredAnswer): boolean;
}

interface AnswerRow {
  task_id: string;
  question: string;
  subject: string | null;
  answer: string;
  model: string;
  created_at_ms: number;
}

export class SqliteAnswerStore implements AnswerStore {
  constructor(private readonly db: TasksDb) {}

  get(taskId: string): StoredAnswer | null {
    const row = this.db.prepare(`SELECT * FROM answers WHERE task_id = ?`).get(taskId) as AnswerRow | undefined;
    if (!row) return null;
    return {
      taskId: row.task_id,
      question: row.question,
      subject: row.subject,
      answer: row.answer,
      model: row.model,
      createdAtMs: row.created_at_ms,
    };
  }

  save(answer: StoredAnswer): boolean {
    const info = this.db
      .prepare(
        `
        INSERT OR IGNORE INTO answers (task_id, question, subject, answer, model, created_at_ms)
        VALUES (@task_id, @question, @subject, @answer, @model, @created_at_ms)
      `
      )
      .run({
        task_id: answer.taskId,
        question: answer.question,
        subject: answer.subject,
        answer: answer.answer,
        model: answer.model,
        created_at_ms: answer.createdAtMs,
      });
    return info.changes > 0;
  }
}
