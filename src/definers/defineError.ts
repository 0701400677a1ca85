import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorDefinitionFinal,
  IErrorHelper,
  IFieldkitError,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class FieldkitError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements IFieldkitError<TData>
{
  constructor(
    public readonly id: string,
    message: string,
    public readonly data: TData,
  ) {
    super(message);
    this.name = id;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinitionFinal<TData>) {}
  get id(): string {
    return this.definition.id;
  }
  throw(data: TData): never {
    throw new FieldkitError(this.definition.id, this.message(data), data);
  }
  is(error: unknown): error is IFieldkitError<TData> {
    return error instanceof FieldkitError && error.id === this.definition.id;
  }
  private message(data: TData): string {
    const base = this.definition.format(data);
    const { remediation } = this.definition;
    if (remediation === undefined) {
      return base;
    }
    const advice =
      typeof remediation === "function" ? remediation(data) : remediation;
    return `${base}\n\nRemediation: ${advice}`;
  }
}

/**
 * Create a new error helper. Without `format` the message is the error id.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>({
    ...definition,
    format: definition.format ?? (() => definition.id),
  });
}
