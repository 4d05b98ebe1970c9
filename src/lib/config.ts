/**
 * Engine configuration
 *
 * Board size and search depth are fixed for the duration of a game.
 * Values come either from a plain object or from HEX_* environment
 * variables and are validated with zod.
 */

import { z } from 'zod'
import { type AIEngine, DEFAULT_ENGINE_CONFIG, type EngineConfig, type MoveResult } from '../ai/ai-engine'
import { negamaxEngine } from '../ai/negamax-engine'
import { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE } from '../game/board'
import { HexError } from '../game/errors'
import { HexGame } from '../game/hex'

export const hexConfigSchema = z.object({
  boardSize: z.number().int().min(1).max(MAX_BOARD_SIZE).default(DEFAULT_BOARD_SIZE),
  searchDepth: z.number().int().min(1).default(DEFAULT_ENGINE_CONFIG.searchDepth),
  timeBudgetMs: z.number().int().positive().optional(),
  alphaBeta: z.boolean().default(true),
  debug: z.boolean().default(false),
})

export type HexConfig = z.infer<typeof hexConfigSchema>

const envFlag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1')

// Environment variables arrive as strings
const envSchema = z.object({
  HEX_BOARD_SIZE: z.coerce.number().optional(),
  HEX_SEARCH_DEPTH: z.coerce.number().optional(),
  HEX_TIME_BUDGET_MS: z.coerce.number().optional(),
  HEX_ALPHA_BETA: envFlag.optional(),
  HEX_DEBUG: envFlag.optional(),
})

export class ConfigError extends HexError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
}

/**
 * Validates a configuration object, filling in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(input: unknown = {}): HexConfig {
  const result = hexConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error))
  }
  return result.data
}

/**
 * Reads HEX_BOARD_SIZE, HEX_SEARCH_DEPTH, HEX_TIME_BUDGET_MS, HEX_ALPHA_BETA
 * and HEX_DEBUG. Unset or empty variables fall back to the defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): HexConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([name, value]) => name.startsWith('HEX_') && value !== undefined && value !== '')
  )

  const result = envSchema.safeParse(present)
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error))
  }

  const vars = result.data
  return parseConfig({
    boardSize: vars.HEX_BOARD_SIZE,
    searchDepth: vars.HEX_SEARCH_DEPTH,
    timeBudgetMs: vars.HEX_TIME_BUDGET_MS,
    alphaBeta: vars.HEX_ALPHA_BETA,
    debug: vars.HEX_DEBUG,
  })
}

export function createGame(config: HexConfig): HexGame {
  return new HexGame(config.boardSize)
}

export function toEngineConfig(config: HexConfig): EngineConfig {
  return {
    searchDepth: config.searchDepth,
    alphaBeta: config.alphaBeta,
    debug: config.debug,
  }
}

/**
 * Asks an engine for a move using the configured depth and time budget.
 */
export function selectConfiguredMove(
  game: HexGame,
  config: HexConfig,
  engine: AIEngine = negamaxEngine
): MoveResult {
  return engine.selectMove(game, toEngineConfig(config), config.timeBudgetMs)
}
