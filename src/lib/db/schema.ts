/**
 * Drizzle schema for the metrics database (SQLite).
 * model_metrics, calibration_tests, handoff_triggers, conversation_analytics
 */

import { sqliteTable, text, integer, real, uniqueIndex } from "drizzle-orm/sqlite-core";

/** One row per local model invocation. Dedup key: model_id + request_timestamp. */
export const modelMetrics = sqliteTable(
  "model_metrics",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    modelId: text("model_id").notNull(),
    timestamp: text("request_timestamp").notNull(),
    promptTokens: integer("prompt_tokens").notNull().default(0),
    completionTokens: integer("completion_tokens").notNull().default(0),
    totalTokens: integer("total_tokens").notNull().default(0),
    latencySeconds: real("latency_seconds").notNull().default(0),
    tokensPerSecond: real("tokens_per_second").notNull().default(0),
    success: integer("success", { mode: "boolean" }).notNull().default(true),
    errorMessage: text("error_message"),
    useCase: text("use_case"),
  },
  (table) => ({
    modelTimestampIdx: uniqueIndex("ux_model_metrics_model_ts").on(table.modelId, table.timestamp),
  })
);

/** Scored calibration prompt/response pairs. Upserted by test_id. */
export const calibrationTests = sqliteTable("calibration_tests", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  testId: text("test_id").notNull().unique(),
  modelId: text("model_id").notNull(),
  promptCategory: text("prompt_category").notNull(),
  prompt: text("prompt").notNull(),
  localResponse: text("local_response").notNull().default(""),
  qualityScore: real("quality_score").notNull().default(0),
  evaluationNotes: text("evaluation_notes", { mode: "json" }).$type<string[]>().notNull(),
  tokensPerSecond: real("tokens_per_second").notNull().default(0),
  timestamp: text("timestamp").notNull(),
  passed: integer("passed", { mode: "boolean" }).notNull().default(false),
});

/** Learned escalation signals. One row per pattern_type + pattern_description. */
export const handoffTriggers = sqliteTable(
  "handoff_triggers",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    patternType: text("pattern_type").notNull(),
    patternDescription: text("pattern_description").notNull(),
    triggerCount: integer("trigger_count").notNull().default(1),
    lastTriggered: text("last_triggered").notNull(),
    confidence: real("confidence").notNull().default(0.5),
    active: integer("active", { mode: "boolean" }).notNull().default(true),
  },
  (table) => ({
    patternIdx: uniqueIndex("ux_handoff_triggers_pattern").on(table.patternType, table.patternDescription),
  })
);

/** Daily conversation aggregates, written by the surrounding admin tooling. */
export const conversationAnalytics = sqliteTable(
  "conversation_analytics",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    date: text("date").notNull(),
    modelId: text("model_id"),
    sessionCount: integer("session_count").notNull().default(0),
    messageCount: integer("message_count").notNull().default(0),
    avgSessionLengthMinutes: real("avg_session_length_minutes").notNull().default(0),
    avgMessagesPerSession: real("avg_messages_per_session").notNull().default(0),
    primaryUseCase: text("primary_use_case"),
  },
  (table) => ({
    dateModelIdx: uniqueIndex("ux_conversation_analytics_date_model").on(table.date, table.modelId),
  })
);

/**
 * DDL kept in step with the tables above. Applied by MetricsStore.initialize();
 * every statement is IF NOT EXISTS so it is safe on every start.
 */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS model_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  model_id TEXT NOT NULL,
  request_timestamp TEXT NOT NULL,
  prompt_tokens INTEGER NOT NULL DEFAULT 0,
  completion_tokens INTEGER NOT NULL DEFAULT 0,
  total_tokens INTEGER NOT NULL DEFAULT 0,
  latency_seconds REAL NOT NULL DEFAULT 0,
  tokens_per_second REAL NOT NULL DEFAULT 0,
  success INTEGER NOT NULL DEFAULT 1,
  error_message TEXT,
  use_case TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_model_metrics_model_ts ON model_metrics (model_id, request_timestamp);

CREATE TABLE IF NOT EXISTS calibration_tests (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  test_id TEXT NOT NULL UNIQUE,
  model_id TEXT NOT NULL,
  prompt_category TEXT NOT NULL,
  prompt TEXT NOT NULL,
  local_response TEXT NOT NULL DEFAULT '',
  quality_score REAL NOT NULL DEFAULT 0,
  evaluation_notes TEXT NOT NULL DEFAULT '[]',
  tokens_per_second REAL NOT NULL DEFAULT 0,
  timestamp TEXT NOT NULL,
  passed INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS ix_calibration_tests_model_ts ON calibration_tests (model_id, timestamp);

CREATE TABLE IF NOT EXISTS handoff_triggers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  pattern_type TEXT NOT NULL,
  pattern_description TEXT NOT NULL,
  trigger_count INTEGER NOT NULL DEFAULT 1,
  last_triggered TEXT NOT NULL,
  confidence REAL NOT NULL DEFAULT 0.5,
  active INTEGER NOT NULL DEFAULT 1
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_handoff_triggers_pattern ON handoff_triggers (pattern_type, pattern_description);

CREATE TABLE IF NOT EXISTS conversation_analytics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  model_id TEXT,
  session_count INTEGER NOT NULL DEFAULT 0,
  message_count INTEGER NOT NULL DEFAULT 0,
  avg_session_length_minutes REAL NOT NULL DEFAULT 0,
  avg_messages_per_session REAL NOT NULL DEFAULT 0,
  primary_use_case TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_conversation_analytics_date_model ON conversation_analytics (date, model_id);
`;
