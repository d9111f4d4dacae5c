/**
 * State invariant checks.
 *
 * The check functions return a list of human-readable violations
 * (empty when the state is sound) so tests can assert on them
 * directly; {@link assertInvariants} turns any violation into an
 * error.
 */

import type { Card } from '../card-system/Card';
import { formatCard, nextRank, sameCard } from '../card-system/Card';
import { DECK_SIZE } from '../card-system/Deck';
import type { Foundation } from './Foundation';
import type { NertzSession } from './NertzGameState';
import { pilesOf } from './NertzGameState';
import { NertzEngineError } from './NertzErrors';

function cardKey(card: Card): string {
  return `${card.owner}:${card.suit}:${card.rank}`;
}

/**
 * Every one of the player's 52 cards sits in exactly one place: one
 * of their own piles or a foundation.
 */
export function checkCardAccounting(session: NertzSession, playerIndex: number): string[] {
  const violations: string[] = [];
  const piles = pilesOf(session, playerIndex);

  const onFoundations = session.foundations
    .values()
    .flatMap((f) => f.cards())
    .filter((c) => c.owner === playerIndex);
  const all = [...piles.cardsInPlay(), ...onFoundations];

  if (all.length !== DECK_SIZE) {
    violations.push(`Player ${playerIndex} accounts for ${all.length} cards, expected ${DECK_SIZE}`);
  }

  const seen = new Set<string>();
  for (const card of all) {
    if (card.owner !== playerIndex) {
      violations.push(`Player ${playerIndex} holds ${formatCard(card)}`);
    }
    const key = cardKey(card);
    if (seen.has(key)) {
      violations.push(`Player ${playerIndex}: ${formatCard(card)} appears more than once`);
    }
    seen.add(key);
  }

  return violations;
}

/**
 * The lake lists exactly the player's cards that sit on foundations.
 */
export function checkLake(session: NertzSession, playerIndex: number): string[] {
  const lake = pilesOf(session, playerIndex).lake.toArray();
  const onFoundations = session.foundations
    .values()
    .flatMap((f) => f.cards())
    .filter((c) => c.owner === playerIndex);

  if (lake.length !== onFoundations.length) {
    return [
      `Player ${playerIndex} lake has ${lake.length} cards but ` +
        `${onFoundations.length} of their cards are on foundations`,
    ];
  }

  const missing = lake.filter((card) => !onFoundations.some((c) => sameCard(c, card)));
  return missing.map(
    (card) => `Player ${playerIndex} lake lists ${formatCard(card)}, which is on no foundation`,
  );
}

/**
 * A foundation starts with an Ace and climbs one rank at a time in
 * a single suit.
 */
export function checkFoundation(foundation: Foundation): string[] {
  const violations: string[] = [];
  const cards = foundation.cards();

  if (cards.length === 0 || cards[0].rank !== 'A') {
    violations.push(`${foundation.identifier} does not start with an Ace`);
  }

  cards.forEach((card, i) => {
    if (card.suit !== foundation.suit) {
      violations.push(`${foundation.identifier} holds off-suit ${formatCard(card)}`);
    }
    if (i > 0 && nextRank(cards[i - 1].rank) !== card.rank) {
      violations.push(
        `${foundation.identifier} has ${formatCard(card)} on ${formatCard(cards[i - 1])}`,
      );
    }
  });

  return violations;
}

/** Every violation in the session. */
export function collectViolations(session: NertzSession): string[] {
  const { gameState, foundations } = session;
  return [
    ...gameState.playerStates.flatMap((_, i) => [
      ...checkCardAccounting(session, i),
      ...checkLake(session, i),
    ]),
    ...foundations.values().flatMap(checkFoundation),
  ];
}

/**
 * @throws NertzEngineError listing every violation, if there are any.
 */
export function assertInvariants(session: NertzSession): void {
  const violations = collectViolations(session);
  if (violations.length > 0) {
    throw new NertzEngineError(`Invariant violations:\n  ${violations.join('\n  ')}`);
  }
}
