/**
 * Graph Solver for Chopsticks
 *
 * Chopsticks is small enough to solve exactly: there are only a few hundred
 * canonical positions. The position graph is cyclic (splits can undo each
 * other), so plain recursive minimax would never terminate. Instead the solver
 * explores the closure of positions reachable from a query, then propagates
 * values backwards from finished games (retrograde analysis). Positions that
 * neither side can force to an end are drawn by repetition.
 *
 * Values are always relative to the player to move in the position.
 */

import {
  type State,
  canonicalize,
  enumerateStates,
  isTerminal,
  stateKey,
  winner,
} from '../game/chopsticks'
import { legalMoves } from '../game/moves'

// ============================================================================
// RESOLVED VALUES
// ============================================================================

/**
 * Exact game-theoretic value of a position for the player to move.
 * `distance` is the number of plies to the end of the game under optimal
 * play from both sides.
 */
export type ResolvedValue =
  | { readonly outcome: 'win'; readonly distance: number }
  | { readonly outcome: 'loss'; readonly distance: number }
  | { readonly outcome: 'draw' }

export type Outcome = ResolvedValue['outcome']

export const DRAW: ResolvedValue = { outcome: 'draw' }

export function win(distance: number): ResolvedValue {
  return { outcome: 'win', distance }
}

export function loss(distance: number): ResolvedValue {
  return { outcome: 'loss', distance }
}

/**
 * The same position seen by the other player.
 */
export function flipPerspective(value: ResolvedValue): ResolvedValue {
  switch (value.outcome) {
    case 'win':
      return loss(value.distance)
    case 'loss':
      return win(value.distance)
    case 'draw':
      return DRAW
  }
}

/**
 * Value of a successor position for the player who moved into it: the
 * opponent's outcome is inverted and the move adds one ply.
 */
export function valueBeforeMove(value: ResolvedValue): ResolvedValue {
  switch (value.outcome) {
    case 'win':
      return loss(value.distance + 1)
    case 'loss':
      return win(value.distance + 1)
    case 'draw':
      return DRAW
  }
}

/**
 * Combines successor values (each relative to the opponent) into the value
 * of the position for the mover.
 *
 * - Any winning move: win, by the fastest one
 * - Otherwise any drawn move: draw
 * - Otherwise every move loses: loss, by the slowest one
 */
export function combineSuccessorValues(successorValues: ResolvedValue[]): ResolvedValue {
  if (successorValues.length === 0) {
    throw new Error('Cannot combine an empty successor list')
  }

  let fastestWin: number | null = null
  let slowestLoss = 0
  let hasDraw = false

  for (const successor of successorValues) {
    const value = valueBeforeMove(successor)
    if (value.outcome === 'win') {
      fastestWin = fastestWin === null ? value.distance : Math.min(fastestWin, value.distance)
    } else if (value.outcome === 'loss') {
      slowestLoss = Math.max(slowestLoss, value.distance)
    } else {
      hasDraw = true
    }
  }

  if (fastestWin !== null) return win(fastestWin)
  if (hasDraw) return DRAW
  return loss(slowestLoss)
}

/**
 * Value of a finished game for the player to move.
 */
export function terminalValue(state: State): ResolvedValue {
  return winner(state) === state.turn ? win(0) : loss(0)
}

export function valuesEqual(a: ResolvedValue, b: ResolvedValue): boolean {
  if (a.outcome === 'draw' || b.outcome === 'draw') {
    return a.outcome === b.outcome
  }
  return a.outcome === b.outcome && a.distance === b.distance
}

export function describeValue(value: ResolvedValue): string {
  if (value.outcome === 'draw') return 'draw by repetition'
  return `${value.outcome} in ${value.distance}`
}

// ============================================================================
// SOLVER
// ============================================================================

export interface SolverStats {
  /** Number of closures solved (memo misses in resolve) */
  searches: number
  /** Positions expanded across all searches */
  statesExplored: number
  /** Edges that led back to a position still on the exploration path */
  repetitionEdges: number
}

export interface GraphSolverOptions {
  /** Log one line per solved closure */
  debug?: boolean
}

interface SearchNode {
  readonly key: string
  readonly state: State
  readonly predecessors: SearchNode[]
  /** True when the value came from the memo table */
  readonly cached: boolean
  /** Successors not yet known to be wins for the opponent */
  pending: number
  value: ResolvedValue | null
}

interface SearchFrame {
  node: SearchNode
  successors: State[]
  next: number
}

/**
 * Exact solver with a process-scoped memo table.
 *
 * Memo entries are only ever added; a value is written once the closure it
 * depends on has been fully propagated, and never changes afterwards.
 * The exploration path only feeds the repetitionEdges counter; values come
 * from propagation alone.
 */
export class GraphSolver {
  private memo = new Map<string, ResolvedValue>()
  private readonly debug: boolean
  private counters: SolverStats = { searches: 0, statesExplored: 0, repetitionEdges: 0 }

  constructor(options: GraphSolverOptions = {}) {
    this.debug = options.debug ?? false
  }

  /**
   * Resolves a position, solving its reachable closure on a memo miss.
   */
  resolve(state: State): ResolvedValue {
    const root = canonicalize(state)
    const key = stateKey(root)

    const cached = this.memo.get(key)
    if (cached !== undefined) {
      return cached
    }

    this.solveClosure(root)

    const value = this.memo.get(key)
    if (value === undefined) {
      throw new Error(`Solver finished without a value for ${key}`)
    }
    return value
  }

  /**
   * Resolves every valid canonical position.
   *
   * @returns Number of memoized positions
   */
  solveAll(): number {
    for (const state of enumerateStates()) {
      this.resolve(state)
    }
    return this.memo.size
  }

  has(state: State): boolean {
    return this.memo.has(stateKey(state))
  }

  get size(): number {
    return this.memo.size
  }

  get stats(): SolverStats {
    return { ...this.counters }
  }

  entries(): IterableIterator<[string, ResolvedValue]> {
    return this.memo.entries()
  }

  /**
   * Discards every memoized value.
   */
  reset(): void {
    this.memo.clear()
    this.counters = { searches: 0, statesExplored: 0, repetitionEdges: 0 }
  }

  private solveClosure(root: State): void {
    this.counters.searches++
    const nodes = this.explore(root)
    this.propagate(nodes)

    let drawn = 0
    for (const node of nodes.values()) {
      if (node.cached) continue
      const value = node.value ?? DRAW
      if (value.outcome === 'draw') drawn++
      this.memo.set(node.key, value)
    }

    if (this.debug) {
      console.info(
        `[Solver] Resolved closure of ${stateKey(root)}: ${nodes.size} positions, ${drawn} drawn`
      )
    }
  }

  private createNode(state: State): SearchNode {
    const key = stateKey(state)
    const cached = this.memo.get(key)
    let value: ResolvedValue | null = null
    if (cached !== undefined) {
      value = cached
    } else if (isTerminal(state)) {
      value = terminalValue(state)
    }

    return { key, state, predecessors: [], cached: cached !== undefined, pending: 0, value }
  }

  private expand(node: SearchNode): SearchFrame {
    // Known values are leaves: their own successors are never needed
    const successors = node.value === null ? legalMoves(node.state).map((t) => t.state) : []
    node.pending = successors.length
    if (successors.length > 0) this.counters.statesExplored++
    return { node, successors, next: 0 }
  }

  /**
   * Depth-first exploration of every position reachable from the root,
   * recording predecessor links for propagation.
   */
  private explore(root: State): Map<string, SearchNode> {
    const rootNode = this.createNode(root)
    const nodes = new Map<string, SearchNode>([[rootNode.key, rootNode]])
    const inProgress = new Set<string>([rootNode.key])
    const stack: SearchFrame[] = [this.expand(rootNode)]

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]

      if (frame.next >= frame.successors.length) {
        inProgress.delete(frame.node.key)
        stack.pop()
        continue
      }

      const successor = frame.successors[frame.next++]
      const key = stateKey(successor)
      // Stats only; a cycle back onto the path never decides a value
      if (inProgress.has(key)) {
        this.counters.repetitionEdges++
      }

      let child = nodes.get(key)
      if (child === undefined) {
        child = this.createNode(successor)
        nodes.set(key, child)
        inProgress.add(key)
        stack.push(this.expand(child))
      }
      child.predecessors.push(frame.node)
    }

    return nodes
  }

  /**
   * Retrograde propagation in nondecreasing distance order. The first losing
   * successor found gives a predecessor its fastest win; the last winning
   * successor found gives a fully refuted predecessor its slowest loss.
   */
  private propagate(nodes: Map<string, SearchNode>): void {
    const buckets: SearchNode[][] = []
    const enqueue = (node: SearchNode, distance: number) => {
      const bucket = buckets[distance] ?? []
      bucket.push(node)
      buckets[distance] = bucket
    }

    for (const node of nodes.values()) {
      if (node.value !== null && node.value.outcome !== 'draw') {
        enqueue(node, node.value.distance)
      }
    }

    for (let distance = 0; distance < buckets.length; distance++) {
      for (const node of buckets[distance] ?? []) {
        const outcome = node.value?.outcome
        for (const predecessor of node.predecessors) {
          if (predecessor.value !== null) continue

          if (outcome === 'loss') {
            predecessor.value = win(distance + 1)
            enqueue(predecessor, distance + 1)
          } else if (--predecessor.pending === 0) {
            predecessor.value = loss(distance + 1)
            enqueue(predecessor, distance + 1)
          }
        }
      }
    }
  }
}
