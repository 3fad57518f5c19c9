export type ConversionErrorCode =
  | 'DOCUMENT_MALFORMED'
  | 'HEADER_MISSING'
  | 'MASTERS_MISSING'
  | 'MASTER_BASE_MISSING'
  | 'MASTER_EXPANSION_MISSING'
  | 'MASTER_ORDER_INVALID'
  | 'HEADER_DESCRIPTION_MISSING'
  | 'COMMAND_OPERAND_INVALID';

export interface ConversionErrorContextByCode {
  readonly DOCUMENT_MALFORMED: { readonly detail: string };
  readonly HEADER_MISSING: Readonly<Record<string, never>>;
  readonly MASTERS_MISSING: Readonly<Record<string, never>>;
  readonly MASTER_BASE_MISSING: { readonly masters: readonly string[] };
  readonly MASTER_EXPANSION_MISSING: { readonly masters: readonly string[] };
  readonly MASTER_ORDER_INVALID: { readonly masters: readonly string[] };
  readonly HEADER_DESCRIPTION_MISSING: Readonly<Record<string, never>>;
  readonly COMMAND_OPERAND_INVALID: {
    readonly command: string;
    readonly operand: string;
    readonly value: string;
    readonly recordId?: string;
  };
}

export type ConversionErrorContext<C extends ConversionErrorCode = ConversionErrorCode> =
  ConversionErrorContextByCode[C];

function formatMessage(message: string, context?: object): string {
  if (context === undefined || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class ConversionError<C extends ConversionErrorCode = ConversionErrorCode> extends Error {
  readonly code: C;
  readonly context?: ConversionErrorContext<C>;

  constructor(code: C, message: string, context?: ConversionErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context));
    this.name = 'ConversionError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

export const conversionError = <C extends ConversionErrorCode>(
  code: C,
  message: string,
  context?: ConversionErrorContext<C>,
  cause?: unknown,
): ConversionError<C> => new ConversionError(code, message, context, cause);

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export function isConversionErrorCode<C extends ConversionErrorCode>(
  error: unknown,
  code: C,
): error is ConversionError<C> {
  return isConversionError(error) && error.code === code;
}
