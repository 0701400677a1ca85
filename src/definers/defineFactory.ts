import { z } from "zod";
import type { IFactory, IFactoryDefinition } from "../types/factory";
import type { ResolvedValues } from "../types/utilities";
import { symbolFactory } from "../types/symbols";
import { BuildPipeline } from "../models/BuildPipeline";
import { globalFactoryRegistry } from "../models/FactoryRegistry";
import type { Logger } from "../models/Logger";
import { getDefaultLogger } from "../config";
import { batchSizeSchema, parseWithSchema } from "../tools/validation";

const definitionSchema = z.object({
  id: z.string().min(1),
  fields: z.record(z.unknown()),
});

/**
 * Create a factory from explicitly declared fields.
 * - `build(overrides)` produces one object, overrides winning over fields
 * - `batch(size, overrides)` produces `size` independent objects
 * - `resolve(overrides)` runs both passes and skips `create`
 *
 * @typeParam TResult - What `create` turns the resolved values into.
 * @param definition - Id, fields and optional `create`, registry and logger.
 * @returns The factory, registered into its registry when `register` is set.
 */
export function defineFactory(
  definition: IFactoryDefinition<ResolvedValues> & { create?: undefined },
): IFactory<ResolvedValues>;
export function defineFactory<TResult>(
  definition: IFactoryDefinition<TResult> & {
    create: (values: ResolvedValues) => TResult;
  },
): IFactory<TResult>;
export function defineFactory<TResult>(
  definition: IFactoryDefinition<TResult | ResolvedValues>,
): IFactory<TResult | ResolvedValues> {
  parseWithSchema(
    definitionSchema,
    definition,
    "Factory definition",
    String(definition.id),
  );

  const { id } = definition;
  const fields = Object.freeze({ ...definition.fields });
  const registry = definition.registry ?? globalFactoryRegistry;
  const create =
    definition.create ?? ((values: ResolvedValues): ResolvedValues => values);
  const logger = (): Logger =>
    (definition.logger ?? getDefaultLogger()).with({
      source: "fieldkit.factory",
      context: { factoryId: id },
    });

  const resolve = (overrides: ResolvedValues = {}): ResolvedValues =>
    new BuildPipeline({
      factoryId: id,
      fields,
      registry,
      logger: logger(),
    }).resolve(overrides);

  const factory: IFactory<TResult | ResolvedValues> = {
    [symbolFactory]: true,
    id,
    fields,
    resolve,
    build(overrides: ResolvedValues = {}) {
      logger().trace(`Building "${id}"`);
      try {
        return create(resolve(overrides));
      } catch (error) {
        logger().debug(`Build of "${id}" failed`, { error });
        throw error;
      }
    },
    batch(size: number, overrides: ResolvedValues = {}) {
      const count = parseWithSchema(batchSizeSchema, size, "Batch size", id);
      logger().trace(`Building a batch of ${count} "${id}"`);
      return Array.from({ length: count }, () => factory.build(overrides));
    },
  };

  if (definition.register) {
    registry.register(factory);
  }

  return factory;
}
