import type { FieldMap, PostResolvedValue } from "../types/field";
import type { IFactoryLookup } from "../types/factory";
import type { ResolvedValues } from "../types/utilities";
import {
  isComputed,
  isDelegated,
  isIgnored,
  isPostResolved,
  isRequired,
} from "../definers/tools";
import { missingRequiredFieldError } from "../errors";
import type { Logger } from "./Logger";

export interface BuildPipelineOptions {
  factoryId: string;
  fields: FieldMap;
  registry: IFactoryLookup;
  logger: Logger;
}

const hasOwn = (target: object, key: string) =>
  Object.prototype.hasOwnProperty.call(target, key);

// Plain assignment to "__proto__" would swap the prototype instead
const setField = (target: ResolvedValues, key: string, value: unknown) => {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
};

/**
 * Two-phase resolution of one object's fields:
 *
 * 1. required check, before anything runs
 * 2. first pass, in declaration order: overrides, computed, delegated and plain
 *    values land in an accumulator; post-resolved fields are deferred
 * 3. second pass, in declaration order: each deferred field sees a frozen
 *    snapshot of the accumulator, including earlier deferred fields
 *
 * The first throwing field aborts the object.
 */
export class BuildPipeline {
  constructor(private readonly options: BuildPipelineOptions) {}

  resolve(overrides: ResolvedValues = {}): ResolvedValues {
    this.checkRequired(overrides);
    const { values, deferred } = this.resolveFirstPass(overrides);
    this.resolveSecondPass(values, deferred);
    return values;
  }

  private checkRequired(overrides: ResolvedValues) {
    for (const [name, field] of Object.entries(this.options.fields)) {
      if (isRequired(field) && !hasOwn(overrides, name)) {
        missingRequiredFieldError.throw({
          factoryId: this.options.factoryId,
          field: name,
        });
      }
    }
  }

  private resolveFirstPass(overrides: ResolvedValues) {
    const { fields, logger } = this.options;
    const values: ResolvedValues = {};
    const deferred: Array<[string, PostResolvedValue]> = [];

    for (const [name, field] of Object.entries(fields)) {
      if (isIgnored(field)) {
        if (hasOwn(overrides, name)) {
          logger.warn(`Override for ignored field "${name}" was dropped`, {
            factoryId: this.options.factoryId,
          });
        }
        continue;
      }

      if (hasOwn(overrides, name)) {
        setField(values, name, overrides[name]);
        continue;
      }

      if (isPostResolved(field)) {
        deferred.push([name, field]);
        continue;
      }

      setField(values, name, this.resolveField(name, field));
    }

    // Undeclared overrides pass straight through
    for (const [name, value] of Object.entries(overrides)) {
      if (!hasOwn(fields, name)) {
        setField(values, name, value);
      }
    }

    return { values, deferred };
  }

  private resolveField(name: string, field: unknown): unknown {
    if (isComputed(field)) {
      this.options.logger.trace(`Resolving computed field "${name}"`);
      return field.resolve();
    }
    if (isDelegated(field)) {
      this.options.logger.trace(`Resolving delegated field "${name}"`, {
        data: { size: field.size },
      });
      return field.resolve(this.options.registry);
    }
    return field;
  }

  private resolveSecondPass(
    values: ResolvedValues,
    deferred: Array<[string, PostResolvedValue]>,
  ) {
    for (const [name, field] of deferred) {
      this.options.logger.trace(`Resolving post-resolved field "${name}"`);
      setField(values, name, field.resolve(name, Object.freeze({ ...values })));
    }
  }
}
