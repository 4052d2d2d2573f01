import { describe, expect, it, vi } from 'vitest'

import { RaceSetupError } from './errors-core'
import { RaceEngine } from './race-engine-core'
import { detectOvertakes } from './ranking-core'
import type { CompetitorInput, CompetitorSnapshot, RaceEvent, TickPosition, TickResult } from './types-core'

const DT = 0.05

function createField(): CompetitorInput[] {
  return [
    {
      name: 'Silver Comet',
      stats: { Speed: 820, Stamina: 640, Power: 700, Guts: 520, Wit: 480 },
      runningStyle: 'FrontRunner',
      distanceAptitude: { Mile: 'A' },
    },
    {
      name: 'Quiet Harbor',
      stats: { Speed: 760, Stamina: 700, Power: 650, Guts: 610, Wit: 560 },
      runningStyle: 'PaceChaser',
    },
    {
      name: 'Late Bloom',
      stats: { Speed: 700, Stamina: 720, Power: 720, Guts: 830, Wit: 400 },
      runningStyle: 'LateSurger',
    },
    {
      name: 'Night Ember',
      stats: { Speed: 690, Stamina: 580, Power: 600, Guts: 900, Wit: 610 },
      runningStyle: 'EndCloser',
      surfaceAptitude: { Turf: 'C' },
    },
    {
      name: 'Paper Kite',
      stats: { Speed: 540, Stamina: 450, Power: 500, Guts: 420, Wit: 300 },
      runningStyle: 'PaceChaser',
    },
    {
      name: 'Mossy Gate',
      stats: { Speed: 600, Stamina: 800, Power: 560, Guts: 700, Wit: 650 },
      runningStyle: 'LateSurger',
      distanceAptitude: { Mile: 'D' },
    },
  ]
}

function runToEnd(engine: RaceEngine, onTick?: (result: TickResult) => void): TickResult[] {
  const results: TickResult[] = []
  while (!engine.isComplete) {
    const result = engine.step(DT)
    results.push(result)
    onTick?.(result)
  }
  return results
}

function ranksOf(positions: readonly TickPosition[]): number[] {
  const ranks: number[] = new Array<number>(positions.length).fill(0)
  positions.forEach((position) => {
    ranks[position.competitorId] = position.rank
  })
  return ranks
}

function overtakesOf(events: readonly RaceEvent[]) {
  return events.flatMap((event) =>
    event.type === 'overtake' ? [{ competitorId: event.competitorId, ...event.payload }] : [],
  )
}

describe('RaceEngine setup', () => {
  it('fails fast on a bad distance or an empty field', () => {
    expect(() => new RaceEngine({ distance: -1 }, createField())).toThrow(RaceSetupError)
    expect(() => new RaceEngine({ distance: 1600 }, [])).toThrow(RaceSetupError)
  })

  it('reports normalization warnings through onWarning', () => {
    const onWarning = vi.fn()
    const engine = new RaceEngine(
      { distance: 1600, surface: 'Sand' },
      [
        { name: 'Twin', stats: { Speed: -10, Stamina: 300, Power: 300, Guts: 300, Wit: 300 } },
        { name: 'Twin', stats: { Speed: 300, Stamina: 300, Power: 300, Guts: 300, Wit: 300 } },
      ],
      { seed: 'warnings', onWarning },
    )
    expect(engine.warnings.map((warning) => warning.code)).toEqual(['unknownSurface', 'negativeStat', 'duplicateName'])
    expect(onWarning).toHaveBeenCalledTimes(3)
    expect(onWarning.mock.calls[1]?.[0]).toMatchObject({ code: 'negativeStat', competitorName: 'Twin', value: -10 })
    expect(engine.idByName('Twin')).toBe(0)
    expect(engine.idByName('Nobody')).toBeUndefined()
  })

  it('ranks everyone at the gate before the first tick', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'gate' })
    expect(engine.ranking().map((position) => [position.competitorId, position.rank])).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
      [3, 4],
      [4, 5],
      [5, 6],
    ])
    expect(engine.tick).toBe(0)
    expect(engine.time).toBe(0)
  })
})

describe('RaceEngine step', () => {
  it('rejects a non-positive or non-finite dt', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'dt' })
    for (const dt of [0, -0.05, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => engine.step(dt)).toThrow(RangeError)
    }
    expect(engine.tick).toBe(0)
  })

  it('emits start events on the first tick only', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'start' })
    const first = engine.step(DT)
    const second = engine.step(DT)
    const starts = first.events.filter((event) => event.type === 'start')
    expect(starts.map((event) => event.competitorId)).toEqual([0, 1, 2, 3, 4, 5])
    expect(starts.every((event) => event.time === 0)).toBe(true)
    expect(second.events.some((event) => event.type === 'start')).toBe(false)
    expect(first.tick).toBe(1)
    expect(second.tick).toBe(2)
    expect(second.time).toBeCloseTo(0.1, 12)
  })

  it('replays identically for the same seed', () => {
    const first = runToEnd(new RaceEngine({ distance: 1600 }, createField(), { seed: 'replay' }))
    const second = runToEnd(new RaceEngine({ distance: 1600 }, createField(), { seed: 'replay' }))
    expect(second).toEqual(first)

    const other = new RaceEngine({ distance: 1600 }, createField(), { seed: 'another-replay' })
    runToEnd(other)
    const finishTimes = (engine: RaceEngine) => engine.outcome().finishers.map((entry) => entry.finishTime)
    const replayed = new RaceEngine({ distance: 1600 }, createField(), { seed: 'replay' })
    runToEnd(replayed)
    expect(finishTimes(other)).not.toEqual(finishTimes(replayed))
  })

  it('keeps every per-tick invariant until the race completes', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'invariants' })
    let previous: CompetitorSnapshot[] = engine.snapshot()
    let previousRanks = ranksOf(engine.ranking())

    const results = runToEnd(engine, (result) => {
      const current = engine.snapshot()
      current.forEach((entry, id) => {
        const before = previous[id]
        if (!before) throw new Error(`missing snapshot for ${id}`)
        expect(entry.distanceCovered).toBeGreaterThanOrEqual(before.distanceCovered)
        if (before.status !== 'active') {
          expect(entry.status).toBe(before.status)
          expect(entry.distanceCovered).toBe(before.distanceCovered)
        }
        expect(entry.stamina).toBeGreaterThan(0)
        expect(entry.stamina).toBeLessThanOrEqual(100)
        expect(entry.momentum).toBeGreaterThanOrEqual(0.8)
        expect(entry.momentum).toBeLessThanOrEqual(1.3)
      })

      // 순위 = 거리 내림차순, 같으면 완주 시각, 그다음 id 순
      const finishKey = (entry: CompetitorSnapshot) => entry.finishTime ?? Number.POSITIVE_INFINITY
      const expectedOrder = [...current]
        .sort((a, b) => {
          if (a.distanceCovered !== b.distanceCovered) return b.distanceCovered - a.distanceCovered
          if (finishKey(a) !== finishKey(b)) return finishKey(a) - finishKey(b)
          return a.competitorId - b.competitorId
        })
        .map((entry) => entry.competitorId)
      expect(result.positions.map((position) => position.competitorId)).toEqual(expectedOrder)
      expect(result.positions.map((position) => position.rank)).toEqual([1, 2, 3, 4, 5, 6])

      const ranks = ranksOf(result.positions)
      const settledIds = new Set(previous.filter((entry) => entry.status === 'finished').map((entry) => entry.competitorId))
      expect(overtakesOf(result.events)).toEqual(detectOvertakes(previousRanks, ranks, settledIds))

      previous = current
      previousRanks = ranks
    })

    const last = results[results.length - 1]
    expect(last?.complete).toBe(true)
    const { finishers, nonFinishers } = engine.outcome()
    expect(finishers.length + nonFinishers.length).toBe(6)
    expect(finishers.map((entry) => entry.place)).toEqual(finishers.map((_, index) => index + 1))
    for (let i = 1; i < finishers.length; i++) {
      expect(finishers[i]?.finishTime ?? 0).toBeGreaterThanOrEqual(finishers[i - 1]?.finishTime ?? 0)
    }

    const finishEvents = results.flatMap((result) => result.events.filter((event) => event.type === 'finish'))
    expect(finishEvents).toHaveLength(finishers.length)
  })

  it('is a no-op once complete', () => {
    const engine = new RaceEngine({ distance: 400 }, createField().slice(0, 2), { seed: 'done' })
    runToEnd(engine)
    const tick = engine.tick
    const time = engine.time
    const before = engine.snapshot()

    const result = engine.step(DT)
    expect(result.complete).toBe(true)
    expect(result.events).toEqual([])
    expect(result.tick).toBe(tick)
    expect(result.time).toBe(time)
    expect(engine.snapshot()).toEqual(before)
  })

  it('interpolates the finish time inside the crossing tick', () => {
    const engine = new RaceEngine({ distance: 1000 }, createField().slice(0, 1), { seed: 'interp' })
    const results = runToEnd(engine)
    const last = results[results.length - 1]
    const [winner] = engine.outcome().finishers
    expect(last).toBeDefined()
    expect(winner).toBeDefined()
    if (!last || !winner) return
    expect(winner.finishTime).toBeGreaterThan(last.time - DT)
    expect(winner.finishTime).toBeLessThanOrEqual(last.time)
    expect(engine.snapshot()[0]?.distanceCovered).toBe(1000)
  })
})

describe('RaceEngine outcomes', () => {
  it('finishes the higher performance coefficient first (two runners, 1000 m)', () => {
    const shared = { Stamina: 600, Power: 600, Guts: 600, Wit: 600 }
    const engine = new RaceEngine(
      { distance: 1000 },
      [
        { name: 'A', stats: { Speed: 700, ...shared } },
        { name: 'B', stats: { Speed: 600, ...shared } },
      ],
      { seed: 'two-runners' },
    )
    const [coefficientA, coefficientB] = engine.performanceCoefficients()
    expect(coefficientA).toBeCloseTo(1.12, 9)
    expect(coefficientB).toBeCloseTo(0.82, 9)

    runToEnd(engine)
    const { finishers, nonFinishers } = engine.outcome()
    expect(nonFinishers).toEqual([])
    expect(finishers.map((entry) => entry.name)).toEqual(['A', 'B'])
    expect(finishers[0]?.finishTime ?? Infinity).toBeLessThan(finishers[1]?.finishTime ?? 0)
  })

  it('freezes a retired competitor and lists it as a non-finisher', () => {
    const field = createField().slice(0, 3)
    field[1] = { name: 'Fading Star', stats: { Speed: 700, Stamina: 50, Power: 650, Guts: 600, Wit: 500 } }
    // 이유가 있는 참가자는 DNF 창에 들어가자마자 리타이어하도록 확률을 올린다.
    const engine = new RaceEngine({ distance: 1600 }, field, {
      seed: 'forced-dnf',
      tuning: { dnf: { gateChance: 1, perPointPenalty: 1, maxChance: 1 } },
    })

    const results = runToEnd(engine)
    const dnfEvents = results.flatMap((result) => result.events.filter((event) => event.type === 'dnf'))
    expect(dnfEvents.map((event) => event.competitorId)).toEqual([1])

    const { finishers, nonFinishers } = engine.outcome()
    expect(finishers.map((entry) => entry.competitorId).sort()).toEqual([0, 2])
    expect(nonFinishers).toHaveLength(1)
    const [retired] = nonFinishers
    expect(retired?.reason).toBe('exhaustion')
    expect(retired?.distanceAtDnf ?? 0).toBeGreaterThanOrEqual(1600 * 0.4)
    expect(retired?.distanceAtDnf ?? Infinity).toBeLessThan(1600 * 0.4 + 3)

    const snapshot = engine.snapshot()[1]
    expect(snapshot?.status).toBe('dnf')
    expect(snapshot?.distanceCovered).toBe(retired?.distanceAtDnf)
    expect(snapshot?.finishTime).toBeNull()

    const dnfTick = results.findIndex((result) => result.events.some((event) => event.type === 'dnf'))
    results.slice(dnfTick).forEach((result) => {
      const position = result.positions.find((entry) => entry.competitorId === 1)
      expect(position?.dnf).toBe(true)
      expect(position?.finished).toBe(false)
      expect(position?.distanceCovered).toBe(retired?.distanceAtDnf)
    })
  })
})

describe('RaceEngine queries', () => {
  it('hands out commentary context as a fresh copy', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'commentary' })
    for (let i = 0; i < 200; i++) engine.step(DT)

    const context = engine.commentaryContext()
    expect(context.raceDistance).toBe(1600)
    expect(context.rankedActivePositions).toHaveLength(6)
    const leader = context.rankedActivePositions[0]
    expect(context.remainingDistance).toBeCloseTo(1600 - (leader?.distanceCovered ?? 0), 9)
    expect(context.time).toBeCloseTo(10, 9)

    context.rankedActivePositions.pop()
    context.finishedIds.push(99)
    const again = engine.commentaryContext()
    expect(again.rankedActivePositions).toHaveLength(6)
    expect(again.finishedIds).toEqual([])
  })

  it('does not let snapshot edits reach the engine', () => {
    const engine = new RaceEngine({ distance: 1600 }, createField(), { seed: 'snapshot' })
    engine.step(DT)
    const snapshot = engine.snapshot()
    const first = snapshot[0]
    if (first) first.distanceCovered = 9999
    expect(engine.snapshot()[0]?.distanceCovered).not.toBe(9999)
  })

  it('lists finished competitors in the commentary context by place', () => {
    const engine = new RaceEngine({ distance: 600 }, createField().slice(0, 3), { seed: 'finish-order' })
    runToEnd(engine)
    const context = engine.commentaryContext()
    expect(context.rankedActivePositions).toEqual([])
    expect(context.finishedIds).toEqual(engine.outcome().finishers.map((entry) => entry.competitorId))
    expect(context.remainingDistance).toBe(0)
  })
})

describe('RaceEngine randomness', () => {
  it('replays identically when neither rng nor seed is given', () => {
    const first = new RaceEngine({ distance: 1000 }, createField().slice(0, 3))
    const second = new RaceEngine({ distance: 1000 }, createField().slice(0, 3))
    expect(runToEnd(second)).toEqual(runToEnd(first))
    expect(second.outcome()).toEqual(first.outcome())
  })
})

describe('RaceEngine finish line', () => {
  function createLargeField(): CompetitorInput[] {
    const styles = ['FrontRunner', 'PaceChaser', 'LateSurger', 'EndCloser']
    return Array.from({ length: 12 }, (_, index) => ({
      name: `Runner ${index + 1}`,
      stats: {
        Speed: 500 + ((index * 137) % 400),
        Stamina: 500 + ((index * 89) % 400),
        Power: 500 + ((index * 61) % 400),
        Guts: 500 + ((index * 173) % 400),
        Wit: 500 + ((index * 47) % 400),
      },
      runningStyle: styles[index % styles.length],
    }))
  }

  it('never reports an overtake involving a runner that had already finished', () => {
    const engine = new RaceEngine({ distance: 3200 }, createLargeField(), { seed: 'finish-line' })
    const finishedBefore = new Set<number>()

    runToEnd(engine, (result) => {
      result.events.forEach((event) => {
        if (event.type !== 'overtake') return
        expect(finishedBefore.has(event.competitorId)).toBe(false)
        expect(event.payload.passedIds.some((id) => finishedBefore.has(id))).toBe(false)
        expect(event.payload.passedIds.length).toBeGreaterThan(0)
      })
      result.positions.forEach((position) => {
        if (position.finished) finishedBefore.add(position.competitorId)
      })
    })

    const { finishers } = engine.outcome()
    expect(finishers.length).toBeGreaterThan(1)
    const finalOrder = engine.ranking().map((position) => position.competitorId)
    expect(finalOrder.slice(0, finishers.length)).toEqual(finishers.map((entry) => entry.competitorId))
    finishers.forEach((entry) => {
      expect(engine.snapshot()[entry.competitorId]?.distanceCovered).toBe(3200)
    })
  })
})

describe('RaceEngine incidents', () => {
  it('slows a runner for exactly the incident duration and then rebounds', () => {
    // tick 1~2는 jitter만, tick 3에 gate/chance/종류를 모두 통과시키고 이후로는 gate에서 막는다.
    const values = [0.5, 0.5, 0, 0, 0, 0.5]
    let calls = 0
    const rng = () => values[calls++] ?? 0.9

    const engine = new RaceEngine({ distance: 1000 }, [{ name: 'Solo', stats: createField()[1]?.stats }], {
      rng,
      tuning: {
        incidents: {
          warmupTicks: 2,
          gateChance: 0.5,
          baseChance: 1,
          minChance: 1,
          brackets: [
            {
              untilProgress: Number.POSITIVE_INFINITY,
              kinds: [{ kind: 'stumble', durationTicks: 5, speedMultiplier: 0.5 }],
            },
          ],
        },
      },
    })

    const results = Array.from({ length: 9 }, () => engine.step(DT))
    const kinds = results.map((result) => result.positions[0]?.incidentKind ?? null)
    expect(kinds).toEqual([null, null, 'stumble', 'stumble', 'stumble', 'stumble', 'stumble', null, null])

    const incidentEvents = results.flatMap((result) => result.events.filter((event) => event.type === 'incident'))
    expect(incidentEvents).toEqual([
      {
        id: 'incident-0-100',
        type: 'incident',
        time: 0.1,
        competitorId: 0,
        payload: { incident: 'stumble', durationTicks: 5, speedMultiplier: 0.5 },
      },
    ])
    expect(incidentEvents[0]?.time).toBe(results[1]?.time)

    const stepped: number[] = []
    results.reduce((previous, result) => {
      const distance = result.positions[0]?.distanceCovered ?? 0
      stepped.push(distance - previous)
      return distance
    }, 0)
    // 사고 중 이동량은 직전/직후 tick보다 확실히 작다.
    expect(stepped[2] ?? 0).toBeLessThan((stepped[1] ?? 0) * 0.6)
    expect(stepped[7] ?? 0).toBeGreaterThan((stepped[6] ?? 0) * 1.6)

    // 1.0 - 0.08 페널티, tick마다 +0.0005 회복, 만료 tick에 +0.09 반동
    expect(engine.snapshot()[0]?.incident).toBeNull()
    expect(engine.snapshot()[0]?.momentum).toBeCloseTo(1.0125 - 0.001, 9)
  })
})

describe('RaceEngine duels', () => {
  it('boosts each member of a close pack once when a duel opens', () => {
    const stats = { Speed: 650, Stamina: 650, Power: 650, Guts: 700, Wit: 600 }
    const engine = new RaceEngine(
      { distance: 1000 },
      [
        { name: 'Twin Peak', stats, runningStyle: 'PaceChaser' },
        { name: 'Twin Vale', stats, runningStyle: 'PaceChaser' },
      ],
      { rng: () => 0.5, tuning: { duel: { baseChance: 10 } } },
    )

    const results = runToEnd(engine)
    const duelTicks = results.filter((result) => result.events.some((event) => event.type === 'duel'))
    const duels = duelTicks.flatMap((result) => result.events.filter((event) => event.type === 'duel'))

    expect(duels).toHaveLength(2)
    expect(duels[0]).toMatchObject({
      competitorId: 0,
      payload: {
        participantIds: [0, 1],
        staminaBoosts: [
          { competitorId: 0, amount: 20 },
          { competitorId: 1, amount: 20 },
        ],
        momentumBoosts: [
          { competitorId: 0, amount: 0.1 },
          { competitorId: 1, amount: 0.1 },
        ],
      },
    })
    // 두 번째는 아직 연 적 없는 1번이 열지만, 부스트는 이미 받았다.
    expect(duels[1]).toMatchObject({
      competitorId: 1,
      payload: { participantIds: [0, 1], staminaBoosts: [], momentumBoosts: [] },
    })

    const firstDuelIndex = results.findIndex((result) => result.events.some((event) => event.type === 'duel'))
    expect(results[firstDuelIndex]?.positions[0]?.distanceCovered ?? 0).toBeGreaterThanOrEqual(500)
    expect(results[firstDuelIndex - 1]?.positions[0]?.distanceCovered ?? Infinity).toBeLessThan(500)
    expect(duelTicks[1]?.tick).toBe((duelTicks[0]?.tick ?? 0) + 1)
  })
})

describe('RaceEngine overtakes', () => {
  it('emits one overtake per improved runner and none while the order holds', () => {
    const base = { Stamina: 600, Power: 600, Guts: 600, Wit: 600 }
    const engine = new RaceEngine(
      { distance: 1000 },
      [
        { name: 'Slow', stats: { Speed: 500, ...base } },
        { name: 'Middle', stats: { Speed: 650, ...base } },
        { name: 'Quick', stats: { Speed: 800, ...base } },
      ],
      { rng: () => 0.5 },
    )

    const results = runToEnd(engine)
    const overtakesByTick = results.map((result) => overtakesOf(result.events))
    // 게이트에서는 id 순(0, 1, 2), 첫 tick 뒤에는 속도 순(2, 1, 0)
    expect(overtakesByTick[0]).toEqual([{ competitorId: 2, fromRank: 3, toRank: 1, passedIds: [0, 1] }])
    expect(overtakesByTick.slice(1).every((tickOvertakes) => tickOvertakes.length === 0)).toBe(true)
    expect(engine.outcome().finishers.map((entry) => entry.name)).toEqual(['Quick', 'Middle', 'Slow'])
  })
})
