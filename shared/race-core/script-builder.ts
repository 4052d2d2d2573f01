import { createHash } from 'crypto'
import {
  DEFAULT_MAX_SIM_TIME_SEC,
  DEFAULT_OUTPUT_FRAME_MS,
  DEFAULT_RACE_SEED,
  DEFAULT_TICK_SEC,
} from './constants-core'
import { RaceEngine } from './race-engine-core'
import type { TuningOverrides } from './tuning-core'
import type {
  CompetitorInput,
  CompetitorStatus,
  RaceConfig,
  RaceConfigInput,
  RaceEvent,
  RaceOutcome,
  SetupWarning,
} from './types-core'

export type RaceScriptBuildOptions = {
  seed: string
  tickSec: number
  outputFrameMs: number
  maxSimTimeSec: number
  tuning: TuningOverrides
  onWarning: (warning: SetupWarning) => void
}

// 배열 인덱스 = 참가자 id
export type RaceScriptKeyframe = {
  elapsedMs: number
  distances: number[]
  speeds: number[]
  stamina: number[]
  status: CompetitorStatus[]
  ranking: number[]
}

export type BuildRaceScriptResult = {
  config: RaceConfig
  competitors: Array<{ competitorId: number; name: string }>
  keyframes: RaceScriptKeyframe[]
  events: RaceEvent[]
  outcome: RaceOutcome
  warnings: SetupWarning[]
  performanceCoefficients: number[]
  // maxSimTimeSec 안에 끝나지 않아서 중간에 끊었는지
  truncated: boolean
  tickSec: number
  outputFrameMs: number
  snapshotHash: string
}

function captureKeyframe(engine: RaceEngine): RaceScriptKeyframe {
  const snapshot = engine.snapshot()
  return {
    elapsedMs: Math.round(engine.time * 1000),
    distances: snapshot.map((entry) => Number(entry.distanceCovered.toFixed(4))),
    speeds: snapshot.map((entry) => Number(entry.lastSpeed.toFixed(4))),
    stamina: snapshot.map((entry) => Number(entry.stamina.toFixed(2))),
    status: snapshot.map((entry) => entry.status),
    ranking: engine.ranking().map((position) => position.competitorId),
  }
}

// 레이스 한 판을 처음부터 끝까지 돌려서 재생용 스크립트(키프레임 + 이벤트)를 만든다.
export function buildRaceScript(
  race: RaceConfigInput,
  competitors: readonly CompetitorInput[],
  options?: Partial<RaceScriptBuildOptions>,
): BuildRaceScriptResult {
  const seed = options?.seed ?? DEFAULT_RACE_SEED
  const tickSec = options?.tickSec ?? DEFAULT_TICK_SEC
  const outputFrameMs = options?.outputFrameMs ?? DEFAULT_OUTPUT_FRAME_MS
  const maxSimTimeSec = options?.maxSimTimeSec ?? DEFAULT_MAX_SIM_TIME_SEC
  const tuning = options?.tuning ?? {}

  const engine = new RaceEngine(race, competitors, { seed, tuning, onWarning: options?.onWarning })

  const keyframes: RaceScriptKeyframe[] = [captureKeyframe(engine)]
  const events: RaceEvent[] = []
  let nextFrameMs = outputFrameMs

  while (!engine.isComplete && engine.time < maxSimTimeSec) {
    const result = engine.step(tickSec)
    events.push(...result.events)

    const elapsedMs = Math.round(result.time * 1000)
    if (elapsedMs >= nextFrameMs || result.complete) {
      keyframes.push(captureKeyframe(engine))
      while (nextFrameMs <= elapsedMs) nextFrameMs += outputFrameMs
    }
  }

  // 정렬은 안정 정렬이라 같은 시각의 이벤트는 엔진이 낸 순서를 유지한다.
  events.sort((a, b) => a.time - b.time)

  const snapshotHash = createHash('sha256')
    .update(
      JSON.stringify({
        config: engine.config,
        profiles: engine.profiles,
        seed,
        tickSec,
        outputFrameMs,
        tuning,
      }),
    )
    .digest('hex')

  return {
    config: engine.config,
    competitors: engine.profiles.map((profile) => ({ competitorId: profile.id, name: profile.name })),
    keyframes,
    events,
    outcome: engine.outcome(),
    warnings: [...engine.warnings],
    performanceCoefficients: engine.performanceCoefficients(),
    truncated: !engine.isComplete,
    tickSec,
    outputFrameMs,
    snapshotHash,
  }
}
