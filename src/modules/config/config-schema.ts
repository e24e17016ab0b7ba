/**
 * Zod validation schemas for the mutant-gate configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - gate settings (kill-ratio threshold, improvement check)
 *  - build history settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Gate settings
// ---------------------------------------------------------------------------

export const GateSettingsSchema = z
  .object({
    /** Minimum kill percentage for a successful build (0-100, inclusive) */
    minimum_kill_ratio: z.number().min(0).max(100),
    /** Also compare the kill percentage with the previous build's */
    kill_ratio_must_improve: z.boolean(),
  })
  .strict()

export type GateSettings = z.infer<typeof GateSettingsSchema>

// ---------------------------------------------------------------------------
// Build history settings
// ---------------------------------------------------------------------------

export const HistorySettingsSchema = z
  .object({
    /** SQLite file holding recorded builds; relative paths resolve from the project root */
    database_path: z.string().min(1),
  })
  .strict()

export type HistorySettings = z.infer<typeof HistorySettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this tool can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = [CURRENT_CONFIG_FORMAT_VERSION]

export const MutantGateConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    global: GlobalSettingsSchema,
    gate: GateSettingsSchema,
    history: HistorySettingsSchema,
  })
  .strict()

export type MutantGateConfig = z.infer<typeof MutantGateConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env vars and CLI flags before merging)
// ---------------------------------------------------------------------------

export const PartialMutantGateConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    global: GlobalSettingsSchema.partial().optional(),
    gate: GateSettingsSchema.partial().optional(),
    history: HistorySettingsSchema.partial().optional(),
  })
  .strict()

export type PartialMutantGateConfig = z.infer<typeof PartialMutantGateConfigSchema>
