/**
 * Card System Module
 *
 * Owner-tagged playing cards, deck construction and shuffling,
 * and the Pile abstraction used for every pile in a Nertz game.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and factory
export type { Card, CardColor, Rank, Suit } from './Card';
export {
  RANKS,
  SUITS,
  createCard,
  sameCard,
  rankValue,
  nextRank,
  cardColor,
  formatCard,
} from './Card';

// Deck factory and operations
export {
  DECK_SIZE,
  createStandardDeck,
  createShuffledDeck,
  shuffle,
  createSeededRng,
} from './Deck';

// Pile abstraction
export { Pile } from './Pile';
