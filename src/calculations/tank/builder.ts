/**
 * Part list accumulation shared by every calculation module
 */

import { ClampEvent, ModuleName, ModuleResult, PartCategory, PartLine } from '../../types';

export class PartListBuilder {
  private readonly parts: PartLine[] = [];
  private readonly clamped: ClampEvent[] = [];

  constructor(
    private readonly module: ModuleName,
    private readonly defaultCategory: PartCategory
  ) {}

  /**
   * Clamp a formula result at zero, recording the event when it was negative
   */
  clamp(partNo: string, rawQuantity: number): number {
    if (rawQuantity < 0) {
      this.clamped.push({ module: this.module, part_no: partNo, raw_quantity: rawQuantity });
      return 0;
    }
    return rawQuantity;
  }

  /** Adds a line; quantities <= 0 are dropped */
  add(partNo: string, quantity: number, description: string, category?: PartCategory): this {
    if (quantity > 0) {
      this.parts.push({
        part_no: partNo,
        quantity: Math.trunc(quantity),
        category: category ?? this.defaultCategory,
        description
      });
    }
    return this;
  }

  /** Like add, but sums into an existing line with the same part number and category */
  merge(partNo: string, quantity: number, description: string, category?: PartCategory): this {
    const target = category ?? this.defaultCategory;
    const existing = this.parts.find(p => p.part_no === partNo && p.category === target);
    if (existing) {
      if (quantity > 0) existing.quantity += Math.trunc(quantity);
      return this;
    }
    return this.add(partNo, quantity, description, category);
  }

  build(): ModuleResult {
    return {
      module: this.module,
      parts: this.parts.map(p => ({ ...p })),
      clamped: [...this.clamped]
    };
  }
}
