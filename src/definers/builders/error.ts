import type { DefaultErrorType, IErrorHelper } from "../../types/error";
import { defineError } from "../defineError";

type Remediation<TData> = string | ((data: TData) => string);

/**
 * Immutable builder for error helpers: each step returns a new builder and
 * leaves the previous one untouched.
 */
export interface ErrorBuilder<TData extends DefaultErrorType = DefaultErrorType> {
  readonly id: string;
  format(fn: (data: TData) => string): ErrorBuilder<TData>;
  /** Advice appended to the message as "Remediation: ...". */
  remediation(advice: Remediation<TData>): ErrorBuilder<TData>;
  build(): IErrorHelper<TData>;
}

interface ErrorDraft<TData> {
  readonly id: string;
  readonly format?: (data: TData) => string;
  readonly remediation?: Remediation<TData>;
}

function fromDraft<TData extends DefaultErrorType>(
  draft: ErrorDraft<TData>,
): ErrorBuilder<TData> {
  const builder: ErrorBuilder<TData> = {
    id: draft.id,
    format: (fn) => fromDraft({ ...draft, format: fn }),
    remediation: (advice) => fromDraft({ ...draft, remediation: advice }),
    build: () => Object.freeze(defineError<TData>(draft)),
  };
  return Object.freeze(builder);
}

export function error<TData extends DefaultErrorType = DefaultErrorType>(
  id: string,
): ErrorBuilder<TData> {
  return fromDraft<TData>({ id });
}
