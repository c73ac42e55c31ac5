import { SelectionError } from '../../types/errors.js';

/**
 * Resolve a 1-based choice against the offered labels
 *
 * @throws SelectionError for non-numeric, fractional or out-of-range input
 */
export function selectForm(labels: readonly string[], choice: string | number): string {
  const raw = typeof choice === 'number' ? String(choice) : choice.trim();

  if (!/^\d+$/.test(raw)) {
    throw new SelectionError(`Invalid input '${raw}': expected a number between 1 and ${labels.length}`, {
      choice: raw,
    });
  }

  const index = Number.parseInt(raw, 10);
  if (index < 1 || index > labels.length) {
    throw new SelectionError(`Invalid choice ${index}: expected a number between 1 and ${labels.length}`, {
      choice: index,
      available: labels.length,
    });
  }

  return labels[index - 1];
}
