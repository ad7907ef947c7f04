export const CARD_CATEGORIES = {
  personal: 'Personal Growth',
  health: 'Health & Fitness',
  food: 'Food & Dining',
  travel: 'Travel & Adventure',
  hobbies: 'Hobbies & Creativity',
  social: 'Social & Relationships',
  professional: 'Professional & Career',
  fun: 'Fun & Silly',
} as const

export type CardCategory = keyof typeof CARD_CATEGORIES

export function isValidCategory(category: string): category is CardCategory {
  return Object.hasOwn(CARD_CATEGORIES, category)
}
