/**
 * Discriminator enum unification
 *
 * A discriminated union whose variants each declare a single-value enum on
 * the discriminator property gets one enum listing every variant's value,
 * and each variant's property is rebound to it.
 */

import { errorMessage } from "@/core/errors";
import { assignGenerationName, createSchema } from "@/ir/schema";
import { extractDependencies } from "@/ir/utils";
import { ownEntry } from "@/parsing/node";
import { createSilentLogger } from "@/utils/logger";
import {
  capitalize,
  sanitizeClassName,
  sanitizeModuleName,
  toEnumMemberName,
} from "@/utils/naming";

import type { ParseWarning } from "@/core/errors";
import type {
  IRSchema,
  JsonValue,
  UnifiedDiscriminatorEnum,
} from "@/ir/types";
import type { IrkitLogger } from "@/utils/logger";

/**
 * `{Union}{Property}Enum`, dropping an "Enum" suffix already on the union
 * e.g., ("Pet", "type") -> "PetTypeEnum", ("ShapeEnum", "kind") -> "ShapeKindEnum"
 */
export function unifiedEnumName(unionName: string, propertyName: string): string {
  const union = unionName.endsWith("Enum") ? unionName.slice(0, -4) : unionName;
  return sanitizeClassName(`${union}${capitalize(propertyName)}Enum`);
}

interface VariantValues {
  values: JsonValue[];
  /** Named enum schema the values came from */
  enumName?: string;
}

export class DiscriminatorEnumCollector {
  readonly unifiedEnums = new Map<string, UnifiedDiscriminatorEnum>();
  readonly variantEnumSkipList = new Set<string>();
  readonly warnings: ParseWarning[] = [];

  /** Schemas created by this collector, never a source of variant values */
  private readonly unifiedSchemas = new Set<IRSchema>();

  constructor(
    private readonly schemas: Map<string, IRSchema>,
    private readonly logger: IrkitLogger = createSilentLogger(),
  ) {}

  /**
   * `"Variant.property"` keys of every discriminator property, so inline
   * enum extraction can leave them to unification
   */
  identifyDiscriminatorProperties(): Set<string> {
    const keys = new Set<string>();

    for (const union of this.schemas.values()) {
      const propertyName = union.discriminator?.propertyName;
      if (!propertyName) continue;

      for (const variant of this.variantsOf(union)) {
        if (variant.name) keys.add(`${variant.name}.${propertyName}`);
      }
    }

    this.logger.debug(`Identified ${keys.size} discriminator properties`);
    return keys;
  }

  /**
   * Unify the discriminator enums of every discriminated union. A union
   * that fails is logged and skipped; the others still run.
   */
  collectUnifiedEnums(): Map<string, UnifiedDiscriminatorEnum> {
    for (const [name, schema] of [...this.schemas]) {
      if (!schema.discriminator || this.variantsOf(schema).length === 0) {
        continue;
      }

      try {
        this.processUnion(name, schema);
      } catch (error) {
        const message = `Failed to process discriminated union '${name}': ${errorMessage(error)}. Skipping.`;
        this.warnings.push({ code: "composition-failure", message });
        this.logger.warn(message);
      }
    }

    return this.unifiedEnums;
  }

  shouldSkipEnum(name: string): boolean {
    return this.variantEnumSkipList.has(name);
  }

  /**
   * Arena schema for a unified enum. Integer typed when the first value is
   * an integer, string typed otherwise.
   */
  createUnifiedEnumSchema(meta: UnifiedDiscriminatorEnum): IRSchema {
    const values = meta.values.map(([, value]) => value);
    const [first] = values;

    const schema = createSchema({
      name: meta.name,
      type:
        typeof first === "number" && Number.isInteger(first)
          ? "integer"
          : "string",
      enum: values,
      description: meta.description,
    });
    assignGenerationName(schema, meta.name, sanitizeModuleName(meta.name));
    return schema;
  }

  // ==========================================================================
  // Union processing
  // ==========================================================================

  private variantsOf(union: IRSchema): IRSchema[] {
    const members = union.oneOf ?? union.anyOf ?? [];
    return members.map((member) =>
      member.name ? (this.schemas.get(member.name) ?? member) : member,
    );
  }

  private processUnion(unionName: string, union: IRSchema): void {
    const propertyName = union.discriminator?.propertyName;
    if (!propertyName) return;

    const valueByVariant = new Map<string, string>();
    for (const [value, ref] of Object.entries(
      union.discriminator?.mapping ?? {},
    )) {
      const variantName = ref.split("/").pop();
      if (variantName) valueByVariant.set(variantName, value);
    }

    const variants = this.variantsOf(union);
    const values: [string, JsonValue][] = [];
    const variantEnumNames = new Set<string>();

    for (const variant of variants) {
      const slot = ownEntry(variant.properties, propertyName);
      if (!slot) {
        this.logger.debug(
          `Variant '${variant.name ?? "anonymous"}' of '${unionName}' has no '${propertyName}' property`,
        );
        continue;
      }

      const found = this.lookupValues(slot, variant, valueByVariant);
      if (!found) continue;

      for (const value of found.values) {
        values.push([toEnumMemberName(value), value]);
      }
      if (found.enumName) variantEnumNames.add(found.enumName);
    }

    if (values.length === 0) {
      this.logger.info(
        `No discriminator values found for union '${unionName}', skipping`,
      );
      return;
    }

    const name = unifiedEnumName(union.name ?? unionName, propertyName);
    const meta: UnifiedDiscriminatorEnum = {
      name,
      propertyName,
      unionSchemaName: union.name ?? unionName,
      values,
      variantEnumNames,
      description: `Discriminator enum for ${union.name ?? unionName} union types.`,
    };

    const enumSchema = this.createUnifiedEnumSchema(meta);
    const existing = this.schemas.get(name);
    if (existing && !this.unifiedSchemas.has(existing)) {
      this.logger.warn(`Unified enum '${name}' replaces an existing schema`);
    }
    this.schemas.set(name, enumSchema);
    this.unifiedSchemas.add(enumSchema);
    this.unifiedEnums.set(name, meta);

    // Rebind each variant's own slot; the previous instance may be shared
    for (const variant of variants) {
      const slot = ownEntry(variant.properties, propertyName);
      if (!slot) continue;

      variant.properties[propertyName] = createSchema({
        ...slot,
        name,
        type: name,
        enum: undefined,
        generationName: name,
        finalModuleStem: enumSchema.finalModuleStem,
        refersToSchema: enumSchema,
      });
    }

    this.dropVariantEnums(variantEnumNames);
  }

  /**
   * Discriminator values of one variant: its inline enum, the enum it
   * refers to, the arena enum named like the property, then the union's
   * mapping
   */
  private lookupValues(
    slot: IRSchema,
    variant: IRSchema,
    valueByVariant: Map<string, string>,
  ): VariantValues | undefined {
    if (slot.enum?.length) {
      return { values: slot.enum, enumName: this.arenaName(slot) };
    }

    const target = slot.refersToSchema;
    if (target?.enum?.length && !this.unifiedSchemas.has(target)) {
      return { values: target.enum, enumName: this.arenaName(target) };
    }

    const named = slot.name ? this.schemas.get(slot.name) : undefined;
    if (named?.enum?.length && !this.unifiedSchemas.has(named)) {
      return { values: named.enum, enumName: this.arenaName(named) };
    }

    const mapped = variant.name ? valueByVariant.get(variant.name) : undefined;
    if (mapped !== undefined) return { values: [mapped] };

    this.logger.debug(
      `No discriminator value for variant '${variant.name ?? "anonymous"}'`,
    );
    return undefined;
  }

  private arenaName(schema: IRSchema): string | undefined {
    return schema.name && this.schemas.get(schema.name) === schema
      ? schema.name
      : undefined;
  }

  /**
   * Delete superseded per-variant enums nothing else references any more
   */
  private dropVariantEnums(names: Set<string>): void {
    const record = Object.fromEntries(this.schemas);

    for (const name of names) {
      const referenced = [...this.schemas].some(
        ([other, schema]) =>
          other !== name && extractDependencies(schema, record).has(name),
      );
      if (referenced) continue;

      this.schemas.delete(name);
      this.variantEnumSkipList.add(name);
      this.logger.debug(`Dropped variant enum '${name}'`);
    }
  }
}
