import { symbolError } from "./symbols";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice on how to fix the error, appended to the formatted message.
   */
  remediation?: string | ((data: TData) => string);
}

export interface IErrorDefinitionFinal<TData extends DefaultErrorType>
  extends IErrorDefinition<TData> {
  format: (data: TData) => string;
}

/**
 * Shape of errors thrown through an error helper.
 */
export interface IFieldkitError<
  TData extends DefaultErrorType = DefaultErrorType,
> extends Error {
  readonly id: string;
  readonly data: TData;
}

/**
 * Runtime helper returned by defineError() and error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's `name` */
  id: string;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IFieldkitError<TData>;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
