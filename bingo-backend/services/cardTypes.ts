import type { CardCategory } from '../utils/categories'
import type { GridConfig, GridLine } from '../utils/grid'

export type CardState = 'draft' | 'finalized'

export interface BingoItem {
  id: string
  cardId: string
  position: number
  content: string
  isCompleted: boolean
  completedAt: string | null
  notes: string | null
  proofUrl: string | null
  createdAt: string
}

export interface BingoCard {
  id: string
  userId: number
  year: number
  title: string | null
  category: CardCategory | null
  displayName: string
  grid: GridConfig
  capacity: number
  state: CardState
  isArchived: boolean
  visibleToFriends: boolean
  createdAt: string
  updatedAt: string
  items: BingoItem[]
}

export interface CardStats {
  cardId: string
  year: number
  totalItems: number
  completedItems: number
  /** Percentage, 0-100 */
  completionRate: number
  bingosAchieved: number
  completedLines: GridLine[]
  firstCompletion: string | null
  lastCompletion: string | null
}

export interface CreateCardParams {
  year: number
  title?: string | null
  category?: string | null
  gridSize?: number
  hasFreeSpace?: boolean
  headerText?: string | null
}

export interface AddItemParams {
  content: string
  position?: number
}

export interface UpdateItemParams {
  content?: string
  position?: number
}

export interface CompleteItemParams {
  notes?: string | null
  proofUrl?: string | null
}

// undefined leaves a field as it is, null clears it
export interface UpdateNotesParams {
  notes?: string | null
  proofUrl?: string | null
}

export interface UpdateMetaParams {
  title?: string | null
  category?: string | null
}

export interface UpdateConfigParams {
  headerText?: string
  hasFreeSpace?: boolean
}

export interface FinalizeParams {
  visibleToFriends?: boolean
}

export interface CloneParams {
  year?: number
  title?: string | null
  category?: string | null
  gridSize?: number
  headerText?: string | null
  hasFreeSpace?: boolean
}

export interface CloneResult {
  card: BingoCard
  truncatedItemCount: number
}

export interface ImportItem {
  position: number
  content: string
}

export interface ImportCardParams extends CreateCardParams {
  items: ImportItem[]
  finalize?: boolean
  visibleToFriends?: boolean
}
