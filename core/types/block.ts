/**
 * Block lookup types shared by the resolver, the public API and the CLI
 */

export type Multiplicity = 'single' | 'multi';

export type ResultShape = 'concatenated' | 'itemized';

/**
 * Request-scoped reentrancy state. One scope belongs to one logical render;
 * it must never be shared between concurrent renders.
 */
export interface RenderScope {
  readonly active: boolean;
  enter(): boolean;
  exit(): void;
}

export interface ResolutionOptions {
  multiplicity?: Multiplicity;
  // A field name or set of field names; defaults to every block-enabled field
  fieldScope?: string | string[];
  resultShape?: ResultShape;
  // Active language; defaults to the language context's current language
  language?: string;
  // Render scope handed through to template overrides
  scope?: RenderScope;
}

export type ResolvedBlock = string | string[];

/**
 * Callback used by the substituter to turn one show reference into text.
 */
export type BlockLookup = (name: string, multi: boolean) => Promise<string>;
