/**
 * Gate Registry — predefined condition types and custom condition registration.
 *
 * Provides factory functions for the built-in condition types:
 * - kill-ratio-threshold: minimum kill percentage (requires `minKillPercent`)
 * - kill-ratio-must-improve: comparison against the previous build
 *
 * Custom conditions can be registered with `registerConditionType(name, factory)`.
 */

import { ConfigurationError } from '../../core/errors.js'
import type { GateSettings } from '../config/config-schema.js'
import {
  IMPROVEMENT_CONDITION_TYPE,
  ImprovementCondition,
  THRESHOLD_CONDITION_TYPE,
  ThresholdCondition,
} from './conditions.js'
import type { Condition, ConditionFactory, ConditionOptions } from './types.js'

// ---------------------------------------------------------------------------
// Registry state
// ---------------------------------------------------------------------------

const _registry: Map<string, ConditionFactory> = new Map()

// ---------------------------------------------------------------------------
// Built-in factories
// ---------------------------------------------------------------------------

function thresholdFactory(options: ConditionOptions): Condition {
  if (options.minKillPercent === undefined) {
    throw new ConfigurationError(
      `${THRESHOLD_CONDITION_TYPE} condition requires options.minKillPercent`,
      { type: THRESHOLD_CONDITION_TYPE },
    )
  }
  return new ThresholdCondition(options.minKillPercent, options.name)
}

function improvementFactory(options: ConditionOptions): Condition {
  return new ImprovementCondition(options.name)
}

_registry.set(THRESHOLD_CONDITION_TYPE, thresholdFactory)
_registry.set(IMPROVEMENT_CONDITION_TYPE, improvementFactory)

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Register a custom condition type. Re-registering a name replaces it.
 *
 * @param type - Unique type name
 * @param factory - Builds the condition from options
 */
export function registerConditionType(type: string, factory: ConditionFactory): void {
  _registry.set(type, factory)
}

/**
 * Create a Condition of the given registered type.
 *
 * @throws {ConfigurationError} for an unknown type or invalid options
 */
export function createCondition(type: string, options: ConditionOptions = {}): Condition {
  const factory = _registry.get(type)
  if (factory === undefined) {
    throw new ConfigurationError(
      `Unknown condition type: "${type}". Register it first with registerConditionType().`,
      { type },
    )
  }
  return factory(options)
}

/**
 * Get all registered condition type names.
 */
export function getRegisteredConditionTypes(): string[] {
  return Array.from(_registry.keys())
}

/**
 * Build the ordered condition list for the gate settings: the kill-ratio
 * threshold always, then the improvement check when it is enabled.
 */
export function createConditionsFromConfig(settings: GateSettings): Condition[] {
  const conditions: Condition[] = [
    createCondition(THRESHOLD_CONDITION_TYPE, { minKillPercent: settings.minimum_kill_ratio }),
  ]
  if (settings.kill_ratio_must_improve) {
    conditions.push(createCondition(IMPROVEMENT_CONDITION_TYPE))
  }
  return conditions
}
