import type { SpreadId } from "@lib/common/enums";

export type Spread = {
  id: SpreadId;
  count: number;
  // positional labels; empty for single-card spreads
  roles: readonly string[];
};

export const SPREADS: Record<SpreadId, Spread> = {
  one: { id: "one", count: 1, roles: [] },
  three: { id: "three", count: 3, roles: ["past", "present", "future"] },
};

export function roleFor(roles: readonly string[], position: number): string {
  return roles[position] ?? `pos${position}`;
}

/** Labels cards by position. Cards past the end of `roles` get `pos<i>`. */
export function assignRoles<T extends object>(
  cards: readonly T[],
  roles: readonly string[],
): (T & { role: string })[] {
  return cards.map((card, position) => ({
    ...card,
    role: roleFor(roles, position),
  }));
}
