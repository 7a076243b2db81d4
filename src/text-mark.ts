import { JSDOM } from "jsdom";

import { BitCodec } from "./bit-codec";
import { ValidationError } from "./errors";
import type { TextCarrier } from "./types";

export const DEFAULT_INSERTION_TAG = "</body>";

export type ExtractionScope = string | readonly string[] | readonly TextCarrier[];

export interface TextMarkOptions {
  codec?: BitCodec;
  /** Literal closing tag the document marker run is inserted before. */
  insertionTag?: string;
}

/**
 * Embeds and extracts zero-width marks in text and markup.
 *
 * Every call takes its scope explicitly. Marks embedded into several nodes
 * come back as a single bitstream, so nodes carrying different payloads must
 * not share an extraction scope.
 */
export class TextMarker {
  readonly codec: BitCodec;
  readonly insertionTag: string;

  constructor(options: TextMarkOptions = {}) {
    this.codec = options.codec ?? new BitCodec();
    this.insertionTag = options.insertionTag ?? DEFAULT_INSERTION_TAG;
    if (this.insertionTag.length === 0) throw new ValidationError("insertionTag must not be empty");
  }

  /** Appends one copy of the marker run to every node. Returns the run. */
  embedIntoScope(scope: readonly TextCarrier[], payload: Uint8Array): string {
    const run = this.codec.encode(payload);
    for (const node of scope) node.textContent = (node.textContent ?? "") + run;
    return run;
  }

  /** @throws ValidationError when the insertion tag does not occur in `markup`. */
  embedIntoDocument(markup: string, payload: Uint8Array): string {
    const at = markup.indexOf(this.insertionTag);
    if (at === -1) {
      throw new ValidationError(`document has no ${this.insertionTag} insertion point`, {
        insertionTag: this.insertionTag,
      });
    }
    return markup.slice(0, at) + this.codec.encode(payload) + markup.slice(at);
  }

  extractFromScope(scope: ExtractionScope): Uint8Array {
    return this.codec.decode(flatten(scope));
  }

  extractFromDocument(markup: string): Uint8Array {
    return this.codec.decode(markup);
  }

  /**
   * Parses `markup` and appends the marker run to every element matching
   * `selector`. Child markup of matched elements is kept.
   */
  embedIntoSelector(markup: string, selector: string, payload: Uint8Array): string {
    const dom = new JSDOM(markup);
    const elements = selectAll(dom, selector);
    const run = this.codec.encode(payload);
    for (const el of elements) el.append(run);
    return dom.serialize();
  }

  extractFromSelector(markup: string, selector: string): Uint8Array {
    const dom = new JSDOM(markup);
    return this.extractFromScope(selectAll(dom, selector));
  }
}

function flatten(scope: ExtractionScope): string {
  if (typeof scope === "string") return scope;
  let text = "";
  for (const part of scope) text += typeof part === "string" ? part : part.textContent ?? "";
  return text;
}

function selectAll(dom: JSDOM, selector: string): Element[] {
  let found: Element[];
  try {
    found = Array.from(dom.window.document.querySelectorAll(selector));
  } catch (err) {
    throw new ValidationError(`invalid selector ${JSON.stringify(selector)}`, {
      selector,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  if (found.length === 0) {
    throw new ValidationError(`selector ${JSON.stringify(selector)} matched no elements`, { selector });
  }
  return found;
}
