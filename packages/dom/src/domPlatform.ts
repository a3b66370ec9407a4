/**
 * packages/dom/src/domPlatform.ts — Platform implementation over a DOM Document.
 *
 * Why: The core reconciler only speaks the `Platform` contract. This host maps
 * it onto standard DOM calls, so it runs against a browser document or any
 * standards-following headless document (linkedom, jsdom).
 *
 * Form state lives in properties, not attributes. For the names below the host
 * writes the property instead of (or besides) the attribute:
 *   - `value` on input, textarea and select
 *   - boolean states such as `checked`, `disabled` and `selected`
 */

import { warnDev } from "@sprig-ui/core";
import type { FrameScheduler, FrameToken, Platform, PlatformEvent } from "@sprig-ui/core";

export type DomSubscription = (event: Event) => void;

export type DomPlatform = Platform<Node, DomSubscription>;

export type DomPlatformOptions = Readonly<{
  /** Frame scheduling. Defaults to the document's requestAnimationFrame, else a timer. */
  scheduler?: FrameScheduler;
}>;

const ELEMENT_NODE = 1;

/**
 * Boolean states written through element properties.
 * `null` means any HTML element carries the property.
 */
const BOOLEAN_PROPERTIES: ReadonlyMap<string, ReadonlySet<string> | null> = new Map<
  string,
  ReadonlySet<string> | null
>([
  ["autofocus", new Set(["button", "input", "select", "textarea"])],
  ["checked", new Set(["input"])],
  [
    "disabled",
    new Set([
      "button",
      "fieldset",
      "input",
      "link",
      "optgroup",
      "option",
      "select",
      "style",
      "textarea",
    ]),
  ],
  ["draggable", null],
  ["hidden", null],
  ["selected", new Set(["option"])],
  ["spellcheck", null],
]);

const VALUE_ELEMENTS: ReadonlySet<string> = new Set(["input", "textarea", "select"]);

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function requireElement(node: Node, op: string): Element {
  if (!isElement(node)) {
    throw new Error(`${op}: node is not an element (${node.nodeName})`);
  }
  return node;
}

/** "true"/"false", or the attribute's own name (or "") for true. Null when not boolean. */
export function parseBooleanAttribute(name: string, value: string): boolean | null {
  if (value === "true" || value === name || value === "") return true;
  if (value === "false") return false;
  return null;
}

function acceptsBooleanProperty(element: Element, name: string): true | "unlisted" | "plain" {
  if (!BOOLEAN_PROPERTIES.has(name)) return "plain";
  const owners = BOOLEAN_PROPERTIES.get(name);
  if (owners === null || owners === undefined) return true;
  return owners.has(element.localName) ? true : "unlisted";
}

function setAttribute(element: Node, name: string, value: string): void {
  const target = requireElement(element, "setAttribute");

  if (name === "value" && VALUE_ELEMENTS.has(target.localName)) {
    Reflect.set(target, "value", value);
    return;
  }

  const accepts = acceptsBooleanProperty(target, name);
  if (accepts === "plain") {
    target.setAttribute(name, value);
    return;
  }
  if (accepts === "unlisted") {
    warnDev(`[sprig][dom] "${name}" is not a state of <${target.localName}>; set as attribute`);
    target.setAttribute(name, value);
    return;
  }

  const parsed = parseBooleanAttribute(name, value);
  if (parsed === null) {
    warnDev(`[sprig][dom] non-boolean value "${value}" for "${name}"`);
    target.setAttribute(name, value);
    return;
  }
  Reflect.set(target, name, parsed);
}

function removeAttribute(element: Node, name: string): void {
  const target = requireElement(element, "removeAttribute");
  if (name === "value" && VALUE_ELEMENTS.has(target.localName)) {
    Reflect.set(target, "value", "");
    target.removeAttribute(name);
    return;
  }
  const accepts = acceptsBooleanProperty(target, name);
  if (accepts === true) {
    Reflect.set(target, name, false);
    return;
  }
  if (accepts === "unlisted") {
    warnDev(`[sprig][dom] "${name}" is not a state of <${target.localName}>; removed as attribute`);
  }
  target.removeAttribute(name);
}

/** String value of the event's target, or "" when it has none. */
export function inputValueOf(event: PlatformEvent): string {
  if (typeof event !== "object" || event === null || !("target" in event)) return "";
  const target: unknown = event.target;
  if (typeof target !== "object" || target === null || !("value" in target)) return "";
  return typeof target.value === "string" ? target.value : "";
}

/**
 * Scheduler over `requestAnimationFrame` when the window has one, otherwise over
 * a short timer (headless documents, server-side tests).
 */
export function createFrameScheduler(view: Window | null, fallbackDelayMs = 16): FrameScheduler {
  if (view !== null && typeof view.requestAnimationFrame === "function") {
    const win = view;
    return {
      requestFrame: (callback) => win.requestAnimationFrame(() => callback()),
      cancelFrame: (token) => win.cancelAnimationFrame(token),
    };
  }

  const cancels = new Map<FrameToken, () => void>();
  let nextToken = 1;
  return {
    requestFrame(callback) {
      const token = nextToken++;
      const handle = setTimeout(() => {
        cancels.delete(token);
        callback();
      }, fallbackDelayMs);
      cancels.set(token, () => clearTimeout(handle));
      return token;
    },
    cancelFrame(token) {
      const cancel = cancels.get(token);
      if (cancel === undefined) return;
      cancels.delete(token);
      cancel();
    },
  };
}

export function createDomPlatform(doc: Document, opts: DomPlatformOptions = {}): DomPlatform {
  const scheduler = opts.scheduler ?? createFrameScheduler(doc.defaultView);

  return {
    requestFrame: (callback) => scheduler.requestFrame(callback),
    cancelFrame: (token) => scheduler.cancelFrame(token),

    createElement: (name) => doc.createElement(name),
    createText: (content) => doc.createTextNode(content),
    setText(node, content) {
      node.textContent = content;
    },

    insertBefore(parent, child, ref) {
      parent.insertBefore(child, ref);
    },
    remove(node) {
      node.parentNode?.removeChild(node);
    },
    parentOf: (node) => node.parentNode,
    nextSiblingOf: (node) => node.nextSibling,

    setAttribute,
    removeAttribute,
    setRawMarkup(element, markup) {
      requireElement(element, "setRawMarkup").innerHTML = markup;
    },
    clearChildren(element) {
      let child = element.firstChild;
      while (child !== null) {
        element.removeChild(child);
        child = element.firstChild;
      }
    },

    listen(element, trigger, callback) {
      const listener: DomSubscription = (event) => callback(event);
      element.addEventListener(trigger, listener);
      return listener;
    },
    unlisten(element, trigger, subscription) {
      element.removeEventListener(trigger, subscription);
    },
    inputValueOf,
  };
}
