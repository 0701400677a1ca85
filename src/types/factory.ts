import { symbolFactory } from "./symbols";
import type { FieldMap } from "./field";
import type { ResolvedValues } from "./utilities";
import type { Logger } from "../models/Logger";

export interface IFactoryReference {
  readonly id: string;
}

/** A factory id, or anything exposing one (a factory definition included). */
export type FactoryIdentity = string | IFactoryReference;

/** Read side of a registry, which is all delegated fields need. */
export interface IFactoryLookup {
  lookup(identity: FactoryIdentity): IFactory<unknown> | undefined;
}

export interface IFactoryRegistry extends IFactoryLookup {
  register(factory: IFactory<unknown>): void;
}

export interface IFactoryDefinition<TResult = ResolvedValues> {
  /** Unique id, used as the registry key. */
  id: string;
  fields: FieldMap;
  /**
   * Turns the resolved values into the built object. Ignored fields are never
   * part of `values`. Defaults to returning `values`.
   */
  create?: (values: ResolvedValues) => TResult;
  /** Where delegated fields look their targets up and `register` stores this factory. */
  registry?: IFactoryRegistry;
  /** Register into `registry` when defined. */
  register?: boolean;
  logger?: Logger;
}

export interface IFactory<TResult = ResolvedValues> extends IFactoryReference {
  readonly [symbolFactory]: true;
  readonly fields: FieldMap;
  /** Builds one object. Overrides win over declared fields. */
  build(overrides?: ResolvedValues): TResult;
  /** Builds `size` independent objects sharing the same overrides. */
  batch(size: number, overrides?: ResolvedValues): TResult[];
  /** Runs both resolution passes without calling `create`. */
  resolve(overrides?: ResolvedValues): ResolvedValues;
}
