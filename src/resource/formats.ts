/** Formats understood by `ResourceLoader.load()`, with a description of each. */
export const FORMATS = Object.freeze({
  raw: 'The raw bytes of the resource, as a Uint8Array.',
  text: 'The resource decoded to a string.',
  json: 'A JSON document.',
  yaml: 'A YAML document, parsed with js-yaml.',
  v8: 'A value written with the node:v8 serializer.',
  cfg: 'A context free grammar, parsed by the injected cfg parser.',
  pcfg: 'A probabilistic context free grammar, parsed by the injected pcfg parser.',
  fcfg: 'A feature grammar, parsed by the injected fcfg parser.',
  fol: 'A list of first order logic expressions, parsed by the injected fol parser.',
  logic: 'A list of logic expressions, parsed by the injected logic parser.',
  val: 'A semantic valuation, parsed by the injected val parser.'
} as const);

export type ResourceFormat = keyof typeof FORMATS;

/** Formats whose values come from an injected parser. */
export type ParserFormat = 'cfg' | 'pcfg' | 'fcfg' | 'fol' | 'logic' | 'val';

export const PARSER_FORMATS: readonly ParserFormat[] = ['cfg', 'pcfg', 'fcfg', 'fol', 'logic', 'val'];

/** File extension to format, used when `format` is `auto`. */
export const AUTO_FORMATS: Readonly<Record<string, ResourceFormat>> = Object.freeze({
  json: 'json',
  yaml: 'yaml',
  yml: 'yaml',
  v8: 'v8',
  cfg: 'cfg',
  pcfg: 'pcfg',
  fcfg: 'fcfg',
  fol: 'fol',
  logic: 'logic',
  val: 'val',
  txt: 'text',
  text: 'text'
});

export function isResourceFormat(value: string): value is ResourceFormat {
  return Object.hasOwn(FORMATS, value);
}

export function isParserFormat(format: ResourceFormat): format is ParserFormat {
  return PARSER_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format implied by the extension of the last path segment of `url`; a
 * trailing `.gz` is looked through.
 */
export function inferFormat(url: string): ResourceFormat | undefined {
  const basename = url.slice(url.lastIndexOf('/') + 1);
  const parts = basename.split('.');
  if (parts.length < 2) return undefined;
  let extension = parts[parts.length - 1];
  if (extension === 'gz') {
    if (parts.length < 3) return undefined;
    extension = parts[parts.length - 2];
  }
  if (extension === undefined || !Object.hasOwn(AUTO_FORMATS, extension)) return undefined;
  return AUTO_FORMATS[extension];
}
