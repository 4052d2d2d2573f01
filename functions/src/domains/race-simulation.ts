import { onCall, HttpsError } from 'firebase-functions/v2/https'
import { z } from 'zod'
import { RaceSetupError, buildRaceScript, listRaces, raceConfigFromCatalog } from '../../../shared/race-core'
import type { CatalogRace, RaceConfigInput, SetupWarning } from '../../../shared/race-core'
import { buildSimulateRaceResponse } from '../common/response-builders'
import type { SimulateRaceResponse } from '../common/response-builders'

// 레이스 시뮬레이션 callable 모음 (simulateRace / listCatalogRaces)
type LoggerLike = {
  info: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error: unknown) => void
}

type RaceSimulationDeps = {
  logger: LoggerLike
  onSetupWarning: (warning: SetupWarning) => void
  region: string
  maxFieldSize: number
}

const statsSchema = z
  .object({
    Speed: z.number(),
    Stamina: z.number(),
    Power: z.number(),
    Guts: z.number(),
    Wit: z.number(),
  })
  .partial()

// 값 자체(음수, 모르는 각질/등급 등)는 엔진이 기본값 + warning으로 정리하니까 여기서는 형태만 본다.
const competitorSchema = z.object({
  name: z.string().max(64).optional(),
  stats: statsSchema.optional(),
  runningStyle: z.string().optional(),
  distanceAptitude: z.record(z.string(), z.string()).optional(),
  surfaceAptitude: z.record(z.string(), z.string()).optional(),
})

const catalogRaceSchema = z.object({
  raceId: z.string().min(1, 'raceId is required'),
  trackCondition: z.string().optional(),
})

const customRaceSchema = z.object({
  distance: z.number().positive('distance must be positive'),
  raceType: z.string().optional(),
  surface: z.string().optional(),
  trackCondition: z.string().optional(),
})

// tick이 너무 잘면 maxSimTimeSec까지 step 수가 폭증한다.
const MIN_TICK_SEC = 0.01

const simulateRaceOptionsSchema = z.object({
  tickSec: z.number().min(MIN_TICK_SEC).max(1).optional(),
  outputFrameMs: z.number().int().min(16).max(5000).optional(),
  maxSimTimeSec: z.number().positive().max(3600).optional(),
  includeKeyframes: z.boolean().optional(),
})

const listCatalogRacesSchema = z.object({
  raceType: z.enum(['Sprint', 'Mile', 'Medium', 'Long']).optional(),
  surface: z.enum(['Turf', 'Dirt']).optional(),
  racecourse: z.string().min(1).optional(),
  month: z.number().int().min(1).max(12).optional(),
})

export function createRaceSimulationCallables(deps: RaceSimulationDeps) {
  const simulateRaceSchema = z.object({
    race: z.union([catalogRaceSchema, customRaceSchema]),
    competitors: z.array(competitorSchema).min(1, 'At least 1 competitor is required').max(deps.maxFieldSize),
    seed: z.string().min(1, 'seed is required'),
    options: simulateRaceOptionsSchema.optional(),
  })

  function resolveRaceInput(race: z.infer<typeof simulateRaceSchema>['race']): RaceConfigInput {
    if ('raceId' in race) {
      // 카탈로그 레이스는 거리/타입/주로가 정해져 있고 마장 상태만 요청에서 받는다.
      const config = raceConfigFromCatalog(race.raceId)
      return { ...config, trackCondition: race.trackCondition ?? config.trackCondition }
    }
    return race
  }

  async function handleSimulateRace(data: unknown): Promise<SimulateRaceResponse> {
    try {
      // 1) 요청 값 형태 확인
      const parseResult = simulateRaceSchema.safeParse(data)
      if (!parseResult.success) {
        throw new HttpsError('invalid-argument', 'Invalid arguments', {
          errors: parseResult.error.flatten().fieldErrors,
        })
      }

      // 2) 레이스 설정 정리 + 시뮬레이션
      const { race, competitors, seed, options } = parseResult.data
      const script = buildRaceScript(resolveRaceInput(race), competitors, {
        seed,
        tickSec: options?.tickSec,
        outputFrameMs: options?.outputFrameMs,
        maxSimTimeSec: options?.maxSimTimeSec,
        onWarning: deps.onSetupWarning,
      })

      deps.logger.info('Simulated race', {
        seed,
        distance: script.config.distance,
        raceType: script.config.raceType,
        fieldSize: script.competitors.length,
        finishers: script.outcome.finishers.length,
        nonFinishers: script.outcome.nonFinishers.length,
        warnings: script.warnings.length,
        truncated: script.truncated,
        snapshotHash: script.snapshotHash,
      })

      return buildSimulateRaceResponse(script, { includeKeyframes: options?.includeKeyframes ?? true })
    } catch (error) {
      deps.logger.error('simulateRace error', error)
      if (error instanceof HttpsError) {
        throw error
      }
      if (error instanceof RaceSetupError) {
        throw new HttpsError('invalid-argument', error.message, { code: error.code })
      }
      throw new HttpsError('internal', 'Failed to simulate race')
    }
  }

  async function handleListCatalogRaces(data: unknown): Promise<{ success: true; races: CatalogRace[] }> {
    try {
      const parseResult = listCatalogRacesSchema.safeParse(data ?? {})
      if (!parseResult.success) {
        throw new HttpsError('invalid-argument', 'Invalid arguments', {
          errors: parseResult.error.flatten().fieldErrors,
        })
      }
      return { success: true, races: listRaces(parseResult.data) }
    } catch (error) {
      deps.logger.error('listCatalogRaces error', error)
      if (error instanceof HttpsError) {
        throw error
      }
      throw new HttpsError('internal', 'Failed to list races')
    }
  }

  const simulateRace = onCall(
    {
      region: deps.region,
      cors: true,
    },
    async (request) => handleSimulateRace(request.data),
  )

  const listCatalogRaces = onCall(
    {
      region: deps.region,
      cors: true,
    },
    async (request) => handleListCatalogRaces(request.data),
  )

  return {
    handleSimulateRace,
    handleListCatalogRaces,
    simulateRace,
    listCatalogRaces,
  }
}
