import type { Rng } from './types-core'

// 문자열 seed 기반 난수 helper
// 같은 seed를 넣으면 레이스 전체가 같은 결과를 만들도록 엔진에 주입해서 쓴다.
export function hashStringToUint32(input: string): number {
  let hash = 2166136261 >>> 0
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i)
    hash = Math.imul(hash, 16777619)
  }
  return hash >>> 0
}

export function createSeededRandom(seed: string | number): Rng {
  // 간단한 deterministic PRNG (seed -> 0~1 난수 함수)
  let state = hashStringToUint32(String(seed))
  if (state === 0) {
    state = 0x9e3779b9
  }

  return () => {
    state += 0x6d2b79f5
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function pickRandomSeeded<T>(items: readonly T[], rng: Rng): T | undefined {
  return items[Math.floor(rng() * items.length)]
}
