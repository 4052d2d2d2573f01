export type RankEntry = {
  competitorId: number
  distance: number
  // 완주한 경우 착순
  place?: number | null
}

export type RankImprovement = {
  competitorId: number
  fromRank: number
  toRank: number
  // 이번 tick에 제친 상대들 (이전엔 앞, 지금은 뒤)
  passedIds: number[]
}

function placeKey(entry: RankEntry): number {
  return entry.place ?? Number.MAX_SAFE_INTEGER
}

// 거리 내림차순, 같으면 착순, 그다음 등록 순서(id 오름차순).
// 완주자는 모두 결승선 거리에 멈추므로 착순대로 놓이고, 리타이어는 멈춘 거리 그대로 정렬한다.
export function rankByDistance(entries: readonly RankEntry[]): number[] {
  return [...entries]
    .sort((a, b) => {
      if (a.distance !== b.distance) return b.distance - a.distance
      return placeKey(a) - placeKey(b) || a.competitorId - b.competitorId
    })
    .map((entry) => entry.competitorId)
}

// order[i] = i+1위 참가자 id -> ranks[id] = 순위(1부터)
export function ranksFromOrder(order: readonly number[]): number[] {
  const ranks: number[] = new Array<number>(order.length).fill(0)
  order.forEach((competitorId, index) => {
    ranks[competitorId] = index + 1
  })
  return ranks
}

// settledIds: tick 시작 전에 이미 완주한 참가자. 추월하지도, 추월당하지도 않는다.
export function detectOvertakes(
  previousRanks: readonly number[],
  nextRanks: readonly number[],
  settledIds: ReadonlySet<number> = new Set(),
): RankImprovement[] {
  const improvements: RankImprovement[] = []
  nextRanks.forEach((toRank, competitorId) => {
    const fromRank = previousRanks[competitorId]
    if (fromRank === undefined || toRank >= fromRank || settledIds.has(competitorId)) return

    const passedIds: number[] = []
    previousRanks.forEach((otherFrom, otherId) => {
      const otherTo = nextRanks[otherId]
      if (otherId === competitorId || otherTo === undefined || settledIds.has(otherId)) return
      if (otherFrom < fromRank && otherTo > toRank) passedIds.push(otherId)
    })
    if (passedIds.length === 0) return
    improvements.push({ competitorId, fromRank, toRank, passedIds })
  })
  return improvements
}
