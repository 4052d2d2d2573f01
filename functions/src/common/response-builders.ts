import type { BuildRaceScriptResult, RaceEvent, RaceScriptKeyframe } from '../../../shared/race-core'

export type SimulateRaceResponse = {
  success: true
  config: BuildRaceScriptResult['config']
  competitors: BuildRaceScriptResult['competitors']
  results: {
    finishers: Array<{ competitorId: number; name: string; place: number; finishTime: number }>
    nonFinishers: Array<{
      competitorId: number
      name: string
      distanceAtDnf: number
      timeAtDnf: number
      reason: string
    }>
  }
  events: RaceEvent[]
  keyframes: RaceScriptKeyframe[]
  warnings: string[]
  performanceCoefficients: number[]
  truncated: boolean
  tickSec: number
  outputFrameMs: number
  inputsSnapshotHash: string
}

// 응답은 사람이 보는 값이라 시간은 ms 단위(소수 3자리), 거리는 cm 단위(소수 2자리)로 자른다.
function roundTime(value: number): number {
  return Number(value.toFixed(3))
}

function roundDistance(value: number): number {
  return Number(value.toFixed(2))
}

function roundEvent(event: RaceEvent): RaceEvent {
  const time = roundTime(event.time)
  switch (event.type) {
    case 'finish':
      return { ...event, time, payload: { ...event.payload, finishTime: roundTime(event.payload.finishTime) } }
    case 'dnf':
      return { ...event, time, payload: { ...event.payload, distance: roundDistance(event.payload.distance) } }
    default:
      return { ...event, time }
  }
}

export function buildSimulateRaceResponse(
  script: BuildRaceScriptResult,
  options: { includeKeyframes: boolean },
): SimulateRaceResponse {
  return {
    success: true,
    config: script.config,
    competitors: script.competitors,
    results: {
      finishers: script.outcome.finishers.map((entry) => ({
        ...entry,
        finishTime: roundTime(entry.finishTime),
      })),
      nonFinishers: script.outcome.nonFinishers.map((entry) => ({
        ...entry,
        distanceAtDnf: roundDistance(entry.distanceAtDnf),
        timeAtDnf: roundTime(entry.timeAtDnf),
      })),
    },
    events: script.events.map(roundEvent),
    // 키프레임은 재생용이라 크기가 커서 요청할 때만 내려준다.
    keyframes: options.includeKeyframes ? script.keyframes : [],
    warnings: script.warnings.map((warning) => warning.message),
    performanceCoefficients: script.performanceCoefficients.map((value) => Number(value.toFixed(4))),
    truncated: script.truncated,
    tickSec: script.tickSec,
    outputFrameMs: script.outputFrameMs,
    inputsSnapshotHash: script.snapshotHash,
  }
}
