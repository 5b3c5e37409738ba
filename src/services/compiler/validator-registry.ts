/**
 * Registry for field validators
 *
 * Keeps validators in registration order, which is also the order the
 * pipeline runs them in. Ids must be unique.
 *
 */

import {
  DESCRIPTOR_SECTIONS,
  type DescriptorSection,
  type FieldValidator,
  type IValidatorRegistry,
} from "./types.js";

/**
 * In-memory validator registry
 *
 * @public
 */
export class ValidatorRegistry implements IValidatorRegistry {
  private readonly validators = new Map<string, FieldValidator>();
  private readonly sectionValidators = new Map<DescriptorSection, FieldValidator[]>();

  constructor() {
    for (const section of DESCRIPTOR_SECTIONS) {
      this.sectionValidators.set(section, []);
    }
  }

  /**
   * Register a validator
   *
   * @param validator - Validator implementation to register
   * @throws When the id is empty or already registered
   */
  register(validator: FieldValidator): void {
    if (!validator.id) {
      throw new Error("Validator must have a non-empty id");
    }

    if (this.validators.has(validator.id)) {
      throw new Error(`Validator with ID '${validator.id}' is already registered`);
    }

    const sectionList = this.sectionValidators.get(validator.section);
    if (!sectionList) {
      throw new Error(`Invalid validator section: ${String(validator.section)}`);
    }

    this.validators.set(validator.id, validator);
    sectionList.push(validator);
  }

  /**
   * All validators in registration order
   */
  getValidators(): readonly FieldValidator[] {
    return [...this.validators.values()];
  }

  getValidatorsForSection(section: DescriptorSection): readonly FieldValidator[] {
    return [...(this.sectionValidators.get(section) ?? [])];
  }

  getValidator(id: string): FieldValidator | undefined {
    return this.validators.get(id);
  }

  getValidatorCount(): number {
    return this.validators.size;
  }
}
