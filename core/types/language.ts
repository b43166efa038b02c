/**
 * One position of an interpreter's argument vector.
 * Placeholders are tagged so a literal argument can never be mistaken for one.
 */
export type TemplateSlot =
  | { kind: 'literal'; value: string }
  | { kind: 'code' }
  | { kind: 'name' };

/**
 * How to invoke the interpreter for a language.
 * `argv` is the whole argument vector, `argv[0]` included.
 */
export interface InterpreterSpec {
  executable: string;
  argv: readonly TemplateSlot[];
}

/**
 * A fully expanded process invocation
 */
export interface Invocation {
  file: string;
  argv: string[];
}

export const CODE_SLOT: TemplateSlot = { kind: 'code' };
export const NAME_SLOT: TemplateSlot = { kind: 'name' };

export function literal(value: string): TemplateSlot {
  return { kind: 'literal', value };
}
