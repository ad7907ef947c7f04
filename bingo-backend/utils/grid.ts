import { CardServiceError } from '../services/errors'

export const GRID_SIZES = [2, 3, 4, 5] as const
export type GridSize = (typeof GRID_SIZES)[number]

export const MAX_GRID_SIZE: GridSize = 5
export const DEFAULT_HEADER_TEXT = 'BINGO'

export interface GridConfig {
  size: GridSize
  hasFreeSpace: boolean
  freeSpacePosition: number | null
  headerText: string
}

export type LineKind = 'row' | 'column' | 'diagonal'

export interface GridLine {
  kind: LineKind
  index: number
  positions: number[]
}

export function isValidGridSize(size: number): size is GridSize {
  return GRID_SIZES.some((s) => s === size)
}

export function totalSquares(size: number): number {
  return size * size
}

/**
 * Odd grids put FREE in the true middle. Even grids have no middle cell, so
 * FREE sits at the upper-left cell of the central 2x2 block.
 */
export function defaultFreeSpacePosition(size: GridSize): number {
  if (size % 2 === 1) {
    return Math.floor(totalSquares(size) / 2)
  }
  const half = size / 2 - 1
  return half * size + half
}

export function normalizeHeaderText(header: string): string {
  return header.trim().toUpperCase()
}

export function defaultHeaderText(size: GridSize): string {
  return Array.from(DEFAULT_HEADER_TEXT).slice(0, size).join('')
}

export function isValidHeaderText(header: string, size: GridSize): boolean {
  const letters = Array.from(header)
  return letters.length >= 1 && letters.length <= size
}

export interface GridConfigInput {
  size?: number
  hasFreeSpace?: boolean
  headerText?: string | null
}

/**
 * Builds a validated grid config, filling in the defaults (5x5, FREE on,
 * "BINGO" header cut to the grid width).
 */
export function createGridConfig(input: GridConfigInput = {}): GridConfig {
  const size = input.size ?? MAX_GRID_SIZE
  if (!isValidGridSize(size)) {
    throw new CardServiceError('INVALID_GRID_SIZE')
  }

  const rawHeader = input.headerText ? normalizeHeaderText(input.headerText) : ''
  const headerText = rawHeader === '' ? defaultHeaderText(size) : rawHeader
  if (!isValidHeaderText(headerText, size)) {
    throw new CardServiceError('INVALID_HEADER_TEXT')
  }

  const hasFreeSpace = input.hasFreeSpace ?? true
  return {
    size,
    hasFreeSpace,
    freeSpacePosition: hasFreeSpace ? defaultFreeSpacePosition(size) : null,
    headerText,
  }
}

export function capacity(grid: GridConfig): number {
  return totalSquares(grid.size) - (grid.freeSpacePosition === null ? 0 : 1)
}

export function isPositionInRange(grid: GridConfig, position: number): boolean {
  return Number.isInteger(position) && position >= 0 && position < totalSquares(grid.size)
}

export function isFreeSpacePosition(grid: GridConfig, position: number): boolean {
  return grid.freeSpacePosition !== null && grid.freeSpacePosition === position
}

export function isValidItemPosition(grid: GridConfig, position: number): boolean {
  return isPositionInRange(grid, position) && !isFreeSpacePosition(grid, position)
}

/** Every position that may hold an item, ascending. */
export function usablePositions(grid: GridConfig): number[] {
  const positions: number[] = []
  for (let p = 0; p < totalSquares(grid.size); p++) {
    if (!isFreeSpacePosition(grid, p)) positions.push(p)
  }
  return positions
}

export function lowestOpenPosition(grid: GridConfig, occupied: Iterable<number>): number | null {
  const taken = new Set(occupied)
  return usablePositions(grid).find((p) => !taken.has(p)) ?? null
}

export function missingPositions(grid: GridConfig, occupied: Iterable<number>): number[] {
  const taken = new Set(occupied)
  return usablePositions(grid).filter((p) => !taken.has(p))
}

export function toRowCol(position: number, size: number): { row: number; col: number } {
  return { row: Math.floor(position / size), col: position % size }
}

export function enumerateLines(size: number): GridLine[] {
  const lines: GridLine[] = []
  const range = Array.from({ length: size }, (_, i) => i)

  for (const row of range) {
    lines.push({ kind: 'row', index: row, positions: range.map((col) => row * size + col) })
  }
  for (const col of range) {
    lines.push({ kind: 'column', index: col, positions: range.map((row) => row * size + col) })
  }
  lines.push({ kind: 'diagonal', index: 0, positions: range.map((i) => i * size + i) })
  lines.push({
    kind: 'diagonal',
    index: 1,
    positions: range.map((i) => i * size + (size - 1 - i)),
  })

  return lines
}

/** Lines where every cell is completed or FREE. */
export function completedLines(grid: GridConfig, completed: Iterable<number>): GridLine[] {
  const marked = new Set(completed)
  if (grid.freeSpacePosition !== null) marked.add(grid.freeSpacePosition)

  return enumerateLines(grid.size).filter((line) => line.positions.every((p) => marked.has(p)))
}

export function countBingos(grid: GridConfig, completed: Iterable<number>): number {
  return completedLines(grid, completed).length
}

/** Returns a random value in [0, 1), like Math.random. */
export type RandomSource = () => number

/** In-place Fisher-Yates; every ordering is equally likely for a uniform source. */
export function shuffleInPlace<T>(values: T[], random: RandomSource): T[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const held = values[i]
    values[i] = values[j]
    values[j] = held
  }
  return values
}

export function pickRandom<T>(values: readonly T[], random: RandomSource): T | undefined {
  if (values.length === 0) return undefined
  return values[Math.floor(random() * values.length)]
}
