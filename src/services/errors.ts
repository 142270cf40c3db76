// Error taxonomy for the citekey / CSL engine.
// Input validation problems (bad citekey syntax, bad note entries) are logged, never thrown;
// everything below is a hard failure surfaced to the caller.

export type CiteErrorCode =
  | 'invalid_citekey'
  | 'missing_standard_id'
  | 'citekey_integrity'
  | 'csl_validation'
  | 'unsupported_repair'
  | 'unsupported_source'
  | 'short_doi_expansion';

export class CiteError<TData extends Record<string, unknown> = Record<string, unknown>> extends Error {
  readonly code: CiteErrorCode;
  readonly data: TData;
  constructor(code: CiteErrorCode, message: string, data: TData){
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
  }
}

export class InvalidCitekeyError extends CiteError<{ citekey: string; reason?: string }> {
  constructor(citekey: string, reason?: string){
    super('invalid_citekey', `invalid citekey: ${citekey}${reason ? `\n${reason}` : ''}`, { citekey, reason });
  }
}

export class MissingStandardIdError extends CiteError<{ item: unknown }> {
  constructor(item: unknown){
    super('missing_standard_id',
      'setStandardId could not detect a field with a citekey / standard_citation. Consider setting the CSL Item "id" field.',
      { item });
  }
}

export class CitekeyIntegrityError extends CiteError<{ citekey: string }> {
  constructor(citekey: string){
    super('citekey_integrity', `inferred standard id is not a valid citekey: ${citekey}`, { citekey });
  }
}

export class CslValidationError extends CiteError<{ messages: string[] }> {
  constructor(message: string, messages: string[] = []){
    super('csl_validation', messages.length ? `${message}\n${messages.join('\n')}` : message, { messages });
  }
}

export class UnsupportedRepairError extends CiteError<{ keyword: string; path: (string|number)[] }> {
  constructor(keyword: string, path: (string|number)[]){
    super('unsupported_repair', `${keyword} is not yet supported`, { keyword, path });
  }
}

export class UnsupportedSourceError extends CiteError<{ source: string; citekey: string }> {
  constructor(source: string, citekey: string){
    super('unsupported_source', `Unsupported citation source ${source} in ${citekey}`, { source, citekey });
  }
}

export class ShortDoiExpansionError extends CiteError<{ shortDoi: string }> {
  constructor(shortDoi: string, message = `could not expand short DOI ${shortDoi}`){
    super('short_doi_expansion', message, { shortDoi });
  }
}

export function isCiteError(e: unknown): e is CiteError {
  return e instanceof CiteError;
}

/** Compact description of any thrown value for log records. */
export function describeError(e: unknown): { name: string; message: string; code?: string } {
  if(e instanceof CiteError) return { name: e.name, message: e.message, code: e.code };
  if(e instanceof Error) return { name: e.name, message: e.message };
  return { name: typeof e, message: String(e) };
}
