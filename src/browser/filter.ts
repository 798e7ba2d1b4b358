/**
 * Directory card filter
 *
 * The predicate is pure; bindFilter() is the only part that touches the DOM.
 * The generator compiles this file into assets/script.js, so it must not
 * import anything.
 */

export interface FilterState {
  term: string;
  /** ALL_CATEGORIES disables category filtering */
  category: string;
}

export interface FilterCard {
  haystack: string;
  category: string;
}

export const ALL_CATEGORIES = '';

export const FILTER_SELECTORS = {
  searchInput: '[data-search-input]',
  categorySelect: '[data-category-filter]',
  card: '[data-card]',
} as const;

export function createFilterState(term = '', category = ALL_CATEGORIES): FilterState {
  return { term, category };
}

export function isCardVisible(card: FilterCard, state: FilterState): boolean {
  const matchesTerm = card.haystack.includes(state.term.toLowerCase());
  const matchesCategory = state.category === ALL_CATEGORIES || card.category === state.category;
  return matchesTerm && matchesCategory;
}

export function applyFilter(cards: readonly FilterCard[], state: FilterState): boolean[] {
  return cards.map((card) => isCardVisible(card, state));
}

export function readFilterCard(element: HTMLElement): FilterCard {
  return {
    haystack: element.dataset.search ?? '',
    category: element.dataset.category ?? '',
  };
}

/**
 * Wire the search input and category selector (both optional) to the cards.
 * Returns the update function so callers can run it once up front.
 */
export function bindFilter(root: ParentNode): () => void {
  const searchInput = root.querySelector<HTMLInputElement>(FILTER_SELECTORS.searchInput);
  const categorySelect = root.querySelector<HTMLSelectElement>(FILTER_SELECTORS.categorySelect);
  const elements = Array.from(root.querySelectorAll<HTMLElement>(FILTER_SELECTORS.card));
  const cards = elements.map(readFilterCard);

  const update = (): void => {
    const state = createFilterState(searchInput?.value ?? '', categorySelect?.value ?? ALL_CATEGORIES);
    const visibility = applyFilter(cards, state);
    elements.forEach((element, index) => {
      element.style.display = visibility[index] ? '' : 'none';
    });
  };

  searchInput?.addEventListener('input', update);
  categorySelect?.addEventListener('change', update);
  return update;
}
