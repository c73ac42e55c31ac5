/**
 * FormGroupingService - Bucket survey records by the form named in their description
 */

import type { DescriptionParser } from '../../extraction/description/DescriptionTableExtractor.js';
import { UNCLASSIFIED_FORM, type FormGroups, type PlacemarkRecord } from '../../types/survey.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ component: 'FormGroupingService' });

export interface FormGroupingOptions {
  /**
   * Leave out placemarks without a form heading instead of collecting them
   * under UNCLASSIFIED_FORM
   */
  dropUnclassified?: boolean;
}

export class FormGroupingService {
  private readonly dropUnclassified: boolean;

  constructor(
    private readonly descriptionParser: DescriptionParser,
    options: FormGroupingOptions = {}
  ) {
    this.dropUnclassified = options.dropUnclassified ?? false;
  }

  /**
   * Group records by form label. Groups appear in first-seen order and keep
   * document order internally.
   */
  group(records: readonly PlacemarkRecord[]): FormGroups {
    const groups: FormGroups = new Map();
    let dropped = 0;

    for (const record of records) {
      const label = this.descriptionParser.extractHeading(record.description);
      if (label === undefined && this.dropUnclassified) {
        dropped++;
        continue;
      }

      const key = label ?? UNCLASSIFIED_FORM;
      const members = groups.get(key);
      if (members) {
        members.push(record);
      } else {
        groups.set(key, [record]);
      }
    }

    logger.debug(
      { placemarkCount: records.length, formCount: groups.size, dropped },
      'Grouped placemarks by form'
    );

    return groups;
  }
}

/**
 * Form labels in the order they are offered for selection
 */
export function formLabels(groups: FormGroups): string[] {
  return [...groups.keys()].sort();
}
