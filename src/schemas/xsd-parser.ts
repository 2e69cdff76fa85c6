/**
 * XSD / WSDL parser — turns a SOAP API schema into OperationSchemas.
 *
 * Accepts a bare XSD document (AXLSoap.xsd style) or a WSDL with embedded
 * `types/schema`. Operations are the binding operations when the WSDL has a
 * binding, otherwise every top-level element `X` that has a matching
 * `XResponse` element. The files of one API version parse together, so a
 * schema may `include` or `import` another file of the same load.
 *
 * The parser keeps document order (sequences are order-sensitive on the
 * wire) and resolves named types, element refs, complexContent extension
 * and simpleContent extension. Anything it cannot represent losslessly is
 * rejected with a SchemaParseError instead of being skipped.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { coerceDefault } from "./coercion";
import {
  Backend,
  ChoiceGroup,
  DraftField,
  FieldSpec,
  FieldType,
  MaxOccurs,
  OperationSchema,
  PrimitiveName,
  RequestValue,
  freezeField,
  isPlainObject,
} from "./field-spec";
import { SchemaParseError } from "../utils/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export interface XsdSetOptions {
  backend: Backend;
  apiVersion: string;
}

export interface XsdSourceOptions extends XsdSetOptions {
  sourceName: string;
}

export interface XsdText {
  text: string;
  sourceName: string;
}

interface ParsedDocument {
  sourceName: string;
  root: XmlNode;
}

interface TopLevelElement {
  node: XmlNode;
  sourceName: string;
  namespace?: string;
}

interface XmlNode {
  tag: string;
  local: string;
  attrs: Record<string, string>;
  children: XmlNode[];
}

interface Content {
  children: DraftField[];
  choices: ChoiceGroup[];
}

interface ResolvedType {
  type: FieldType;
  content: Content;
}

// ── Constants ───────────────────────────────────────────────────────────────

const XSD_NAMESPACE = "http://www.w3.org/2001/XMLSchema";

const BUILTIN_TYPES = new Map<string, PrimitiveName>(Object.entries({
  string: "string",
  normalizedString: "string",
  token: "string",
  language: "string",
  Name: "string",
  NCName: "string",
  ID: "string",
  IDREF: "string",
  anyURI: "string",
  QName: "string",
  anyType: "string",
  anySimpleType: "string",
  base64Binary: "string",
  hexBinary: "string",
  duration: "string",
  time: "string",
  byte: "int",
  short: "int",
  int: "int",
  integer: "int",
  long: "int",
  nonNegativeInteger: "int",
  positiveInteger: "int",
  nonPositiveInteger: "int",
  negativeInteger: "int",
  unsignedByte: "int",
  unsignedShort: "int",
  unsignedInt: "int",
  unsignedLong: "int",
  decimal: "decimal",
  float: "decimal",
  double: "decimal",
  boolean: "boolean",
  date: "date",
  dateTime: "dateTime",
} satisfies Record<string, PrimitiveName>));

const UNSUPPORTED = new Set([
  "import",
  "include",
  "redefine",
  "group",
  "attributeGroup",
  "any",
  "list",
  "union",
]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: false,
  preserveOrder: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
});

// ── XML tree helpers ────────────────────────────────────────────────────────

function localName(qualified: string): string {
  const idx = qualified.indexOf(":");
  return idx === -1 ? qualified : qualified.slice(idx + 1);
}

function prefixOf(qualified: string): string {
  const idx = qualified.indexOf(":");
  return idx === -1 ? "" : qualified.slice(0, idx);
}

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isPlainObject(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith("@_")) attrs[key.slice(2)] = String(value);
  }
  return attrs;
}

function toNodes(ordered: unknown): XmlNode[] {
  if (!Array.isArray(ordered)) return [];
  const nodes: XmlNode[] = [];
  for (const entry of ordered) {
    if (!isPlainObject(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ":@" || key === "#text" || key.startsWith("?")) continue;
      nodes.push({
        tag: key,
        local: localName(key),
        attrs: readAttrs(entry[":@"]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

function childrenNamed(node: XmlNode, local: string): XmlNode[] {
  return node.children.filter((c) => c.local === local);
}

// ── Parser ──────────────────────────────────────────────────────────────────

class XsdSchemaSet {
  private readonly complexTypes = new Map<string, XmlNode>();
  private readonly simpleTypes = new Map<string, XmlNode>();
  private readonly elements = new Map<string, TopLevelElement>();
  private readonly definedIn = new Map<string, string>();
  private readonly namespaces = new Map<string, string>();
  private readonly bindingOperations: Array<{ name: string; soapAction?: string }> = [];
  private readonly siblings: Set<string>;
  private currentSource: string;

  constructor(
    private readonly documents: readonly ParsedDocument[],
    private readonly options: XsdSetOptions
  ) {
    this.siblings = new Set(documents.map((d) => baseName(d.sourceName)));
    this.currentSource = documents.map((d) => d.sourceName).join(", ");
    for (const doc of documents) {
      this.currentSource = doc.sourceName;
      this.indexDocument(doc.root);
    }
  }

  operations(): OperationSchema[] {
    this.currentSource = this.documents.map((d) => d.sourceName).join(", ");
    const candidates =
      this.bindingOperations.length > 0
        ? this.bindingOperations
        : [...this.elements.keys()]
            .filter((name) => this.elements.has(`${name}Response`))
            .map((name) => ({ name, soapAction: undefined }));

    if (candidates.length === 0) this.fail("no operations found");

    return candidates.map(({ name, soapAction }) => {
      const request = this.elements.get(name);
      const response = this.elements.get(`${name}Response`);
      if (!request || !response) {
        this.fail(`operation '${name}' is missing its request or response element`);
      }
      this.currentSource = request.sourceName;
      return new OperationSchema({
        name,
        apiVersion: this.options.apiVersion,
        backend: this.options.backend,
        request: this.buildRoot(request.node),
        response: this.buildRoot(response.node),
        soapAction,
        namespace: request.namespace,
      });
    });
  }

  // ── Indexing ──────────────────────────────────────────────────────────────

  private indexDocument(root: XmlNode): void {
    this.collectNamespaces(root);

    if (root.local === "schema") {
      this.indexSchema(root, root.attrs["targetNamespace"]);
    } else if (root.local === "definitions") {
      const imports = childrenNamed(root, "import");
      imports.forEach((node) => this.checkLocation(node, "location"));
      const schemas = childrenNamed(root, "types").flatMap((t) => childrenNamed(t, "schema"));
      if (schemas.length === 0 && imports.length === 0) this.fail("WSDL has no embedded types/schema");
      schemas.forEach((s) => this.indexSchema(s, s.attrs["targetNamespace"] ?? root.attrs["targetNamespace"]));
      this.indexBindings(root);
    } else {
      this.fail(`unexpected root element <${root.tag}>; expected an XSD schema or WSDL definitions`);
    }
  }

  private collectNamespaces(node: XmlNode): void {
    for (const [key, value] of Object.entries(node.attrs)) {
      const prefix = key === "xmlns" ? "" : key.startsWith("xmlns:") ? key.slice(6) : undefined;
      if (prefix !== undefined && !this.namespaces.has(prefix)) this.namespaces.set(prefix, value);
    }
  }

  private indexSchema(schema: XmlNode, namespace: string | undefined): void {
    this.collectNamespaces(schema);

    for (const child of schema.children) {
      if (child.local === "include" || child.local === "import") {
        this.checkLocation(child, "schemaLocation");
        continue;
      }
      this.rejectUnsupported(child);
      const name = child.attrs["name"];
      if (!name) continue;
      switch (child.local) {
        case "complexType":
          this.register(`type '${name}'`);
          this.complexTypes.set(name, child);
          break;
        case "simpleType":
          this.register(`type '${name}'`);
          this.simpleTypes.set(name, child);
          break;
        case "element":
          this.register(`element '${name}'`);
          this.elements.set(name, { node: child, sourceName: this.currentSource, namespace });
          break;
        default:
          break;
      }
    }
  }

  /** A name may be declared by one source only. */
  private register(key: string): void {
    const owner = this.definedIn.get(key);
    if (owner !== undefined && owner !== this.currentSource) {
      this.fail(`${key} is also defined in ${owner}`);
    }
    this.definedIn.set(key, this.currentSource);
  }

  /**
   * include/import must point at another source of the same load. An import
   * without a location names a namespace only; its types resolve or fail later.
   */
  private checkLocation(node: XmlNode, attr: string): void {
    const location = node.attrs[attr];
    if (location === undefined) {
      if (node.local === "include") this.fail(`<${node.tag}> without a ${attr}`);
      return;
    }
    if (!this.siblings.has(baseName(location))) {
      this.fail(`${node.local} of '${location}' is not among the sources of this load`);
    }
  }

  private indexBindings(definitions: XmlNode): void {
    for (const binding of childrenNamed(definitions, "binding")) {
      for (const op of childrenNamed(binding, "operation")) {
        const name = op.attrs["name"];
        if (!name || this.bindingOperations.some((b) => b.name === name)) continue;
        const soapOp = childrenNamed(op, "operation")[0];
        this.bindingOperations.push({ name, soapAction: soapOp?.attrs["soapAction"] });
      }
    }
  }

  // ── Building ──────────────────────────────────────────────────────────────

  private buildRoot(node: XmlNode): FieldSpec {
    const draft = this.buildElement(node, [], { inChoice: false, optional: false, repeated: false });
    draft.minOccurs = 1;
    draft.maxOccurs = 1;
    if (draft.type.kind !== "object") {
      draft.type = { kind: "object" };
      draft.children = [];
      draft.choices = [];
    }
    return freezeField(draft, null, (path) => this.fail(`duplicate field '${path}'`));
  }

  private buildElement(
    node: XmlNode,
    typeStack: string[],
    ctx: { inChoice: boolean; optional: boolean; repeated: boolean }
  ): DraftField {
    let target = node;
    let stack = typeStack;
    const ref = node.attrs["ref"];
    if (ref) {
      const key = `element ${localName(ref)}`;
      const referenced = this.elements.get(localName(ref))?.node;
      if (!referenced) this.fail(`unresolved element reference '${ref}'`);
      if (stack.includes(key)) this.fail(`recursive element reference '${ref}'`);
      target = referenced;
      stack = [...stack, key];
    }

    const name = target.attrs["name"];
    if (!name) this.fail(`element without a name under <${node.tag}>`);

    const minOccurs = ctx.optional ? 0 : this.parseOccurs(node.attrs["minOccurs"], name);
    const declaredMax = this.parseMaxOccurs(node.attrs["maxOccurs"], name);
    const maxOccurs: MaxOccurs = ctx.repeated ? "unbounded" : declaredMax;

    const resolved = this.resolveElementType(target, name, stack);
    const draft: DraftField = {
      name,
      type: resolved.type,
      minOccurs,
      maxOccurs,
      nillable: target.attrs["nillable"] === "true",
      attribute: false,
      inChoice: ctx.inChoice,
      children: resolved.content.children,
      choices: resolved.content.choices,
    };

    const defaultText = target.attrs["default"];
    if (defaultText !== undefined) draft.default = this.coerceDefaultOrFail(defaultText, draft);
    return draft;
  }

  private resolveElementType(node: XmlNode, name: string, stack: string[]): ResolvedType {
    const typeRef = node.attrs["type"];
    if (typeRef) return this.resolveTypeRef(typeRef, stack);

    const inlineComplex = childrenNamed(node, "complexType")[0];
    if (inlineComplex) return this.buildComplexType(inlineComplex, stack);

    const inlineSimple = childrenNamed(node, "simpleType")[0];
    if (inlineSimple) return { type: this.resolveSimpleType(inlineSimple, name), content: empty() };

    // untyped elements are xsd:anyType; treated as text
    return { type: { kind: "primitive", primitive: "string" }, content: empty() };
  }

  private resolveTypeRef(qualified: string, stack: string[]): ResolvedType {
    const local = localName(qualified);
    const ns = this.namespaces.get(prefixOf(qualified));
    const builtin = BUILTIN_TYPES.get(local);

    if (builtin && (ns === XSD_NAMESPACE || !this.isLocalType(local))) {
      return { type: { kind: "primitive", primitive: builtin }, content: empty() };
    }

    const simple = this.simpleTypes.get(local);
    if (simple) return { type: this.resolveSimpleType(simple, local), content: empty() };

    const complex = this.complexTypes.get(local);
    if (complex) {
      if (stack.includes(local)) {
        this.fail(`recursive type '${local}' (${[...stack, local].join(" -> ")})`);
      }
      return this.buildComplexType(complex, [...stack, local]);
    }

    this.fail(`unresolved type reference '${qualified}'`);
  }

  private isLocalType(local: string): boolean {
    return this.simpleTypes.has(local) || this.complexTypes.has(local);
  }

  private resolveSimpleType(node: XmlNode, context: string): FieldType {
    for (const child of node.children) this.rejectUnsupported(child);

    const restriction = childrenNamed(node, "restriction")[0];
    if (!restriction) this.fail(`simple type '${context}' has no restriction`);

    // AXL declares its own `boolean` as a string pattern (t|f|true|false)
    if (context === "boolean") return { kind: "primitive", primitive: "boolean" };

    const values = childrenNamed(restriction, "enumeration").map((e) => e.attrs["value"] ?? "");
    if (values.length > 0) return { kind: "enum", values: Object.freeze(values) };

    const base = restriction.attrs["base"];
    let type: FieldType = { kind: "primitive", primitive: "string" };
    if (base) {
      const resolved = this.resolveTypeRef(base, []);
      if (resolved.type.kind === "object") {
        this.fail(`simple type '${context}' restricts complex type '${base}'`);
      }
      type = resolved.type;
    }

    const maxLength = childrenNamed(restriction, "maxLength")[0]?.attrs["value"];
    if (maxLength !== undefined && type.kind === "primitive") {
      const limit = Number(maxLength);
      if (!Number.isInteger(limit)) this.fail(`invalid maxLength '${maxLength}' on '${context}'`);
      type = { ...type, maxLength: limit };
    }
    return type;
  }

  private buildComplexType(node: XmlNode, stack: string[]): ResolvedType {
    const content = empty();
    let type: FieldType = { kind: "object" };

    for (const child of node.children) {
      this.rejectUnsupported(child);
      switch (child.local) {
        case "sequence":
        case "all":
        case "choice":
          this.addGroup(child, content, stack, { inChoice: false, optional: false, repeated: false });
          break;
        case "attribute":
          content.children.push(this.buildAttribute(child));
          break;
        case "complexContent":
          this.addComplexContent(child, content, stack);
          break;
        case "simpleContent":
          type = this.addSimpleContent(child, content);
          break;
        default:
          break;
      }
    }
    return { type, content };
  }

  private addComplexContent(node: XmlNode, content: Content, stack: string[]): void {
    const derivation = node.children.find((c) => c.local === "extension" || c.local === "restriction");
    if (!derivation) this.fail("complexContent without extension or restriction");

    if (derivation.local === "extension") {
      const base = derivation.attrs["base"];
      if (!base) this.fail("complexContent extension without a base");
      const inherited = this.resolveTypeRef(base, stack);
      content.children.push(...inherited.content.children);
      content.choices.push(...inherited.content.choices);
    }

    for (const child of derivation.children) {
      this.rejectUnsupported(child);
      if (child.local === "sequence" || child.local === "all" || child.local === "choice") {
        this.addGroup(child, content, stack, { inChoice: false, optional: false, repeated: false });
      } else if (child.local === "attribute") {
        content.children.push(this.buildAttribute(child));
      }
    }
  }

  private addSimpleContent(node: XmlNode, content: Content): FieldType {
    const derivation = node.children.find((c) => c.local === "extension" || c.local === "restriction");
    const base = derivation?.attrs["base"];
    if (!derivation || !base) this.fail("simpleContent without a base type");

    const resolved = this.resolveTypeRef(base, []);
    if (resolved.type.kind === "object") {
      this.fail(`simpleContent base '${base}' is not a simple type`);
    }
    content.children.push(...resolved.content.children.filter((c) => c.attribute));

    for (const child of derivation.children) {
      this.rejectUnsupported(child);
      if (child.local === "attribute") content.children.push(this.buildAttribute(child));
    }
    return resolved.type;
  }

  private buildAttribute(node: XmlNode): DraftField {
    const name = node.attrs["name"];
    if (!name) this.fail("attribute without a name");

    let type: FieldType = { kind: "primitive", primitive: "string" };
    const typeRef = node.attrs["type"];
    const inline = childrenNamed(node, "simpleType")[0];
    if (typeRef) {
      const resolved = this.resolveTypeRef(typeRef, []);
      if (resolved.type.kind === "object") this.fail(`attribute '${name}' has a complex type`);
      type = resolved.type;
    } else if (inline) {
      type = this.resolveSimpleType(inline, name);
    }

    const draft: DraftField = {
      name,
      type,
      minOccurs: node.attrs["use"] === "required" ? 1 : 0,
      maxOccurs: 1,
      nillable: false,
      attribute: true,
      inChoice: false,
      children: [],
      choices: [],
    };
    const defaultText = node.attrs["default"];
    if (defaultText !== undefined) draft.default = this.coerceDefaultOrFail(defaultText, draft);
    return draft;
  }

  /**
   * Flatten a sequence/all/choice into the enclosing content. Returns the
   * element names the group contributed, which a choice uses as its branch.
   */
  private addGroup(
    group: XmlNode,
    content: Content,
    stack: string[],
    ctx: { inChoice: boolean; optional: boolean; repeated: boolean }
  ): string[] {
    const groupOptional = ctx.optional || group.attrs["minOccurs"] === "0";
    const groupRepeated =
      ctx.repeated || isRepeatedText(group.attrs["maxOccurs"]);

    if (group.local === "choice") {
      return this.addChoice(group, content, stack, {
        inChoice: ctx.inChoice,
        optional: groupOptional,
        repeated: groupRepeated,
      });
    }

    const names: string[] = [];
    for (const child of group.children) {
      this.rejectUnsupported(child);
      const childCtx = { inChoice: ctx.inChoice, optional: groupOptional, repeated: groupRepeated };
      if (child.local === "element") {
        const draft = this.buildElement(child, stack, childCtx);
        this.pushChild(content, draft, ctx.inChoice);
        names.push(draft.name);
      } else if (child.local === "sequence" || child.local === "all" || child.local === "choice") {
        names.push(...this.addGroup(child, content, stack, childCtx));
      }
    }
    return names;
  }

  private addChoice(
    choice: XmlNode,
    content: Content,
    stack: string[],
    ctx: { inChoice: boolean; optional: boolean; repeated: boolean }
  ): string[] {
    const branches = this.choiceBranches(choice, content, stack, ctx.repeated);
    // a choice nested in a branch (or in an optional group) only binds when its branch is taken
    content.choices.push({ required: !ctx.inChoice && !ctx.optional, branches });
    return branches.flat();
  }

  private choiceBranches(
    choice: XmlNode,
    content: Content,
    stack: string[],
    repeated: boolean
  ): string[][] {
    const branches: string[][] = [];
    const branchCtx = { inChoice: true, optional: false, repeated };

    for (const child of choice.children) {
      this.rejectUnsupported(child);
      if (child.local === "element") {
        const draft = this.buildElement(child, stack, branchCtx);
        this.pushChild(content, draft, true);
        branches.push([draft.name]);
      } else if (child.local === "sequence" || child.local === "all") {
        const names = this.addGroup(child, content, stack, branchCtx);
        if (names.length > 0) branches.push(names);
      } else if (child.local === "choice") {
        branches.push(...this.choiceBranches(child, content, stack, repeated));
      }
    }
    return branches;
  }

  private pushChild(content: Content, draft: DraftField, inChoice: boolean): void {
    const existing = content.children.find((c) => c.name === draft.name);
    if (existing && inChoice && existing.inChoice) return; // same element offered by two branches
    content.children.push(draft);
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private parseOccurs(text: string | undefined, name: string): number {
    if (text === undefined) return 1;
    const value = Number(text);
    if (!Number.isInteger(value) || value < 0) this.fail(`invalid minOccurs '${text}' on '${name}'`);
    return value;
  }

  private parseMaxOccurs(text: string | undefined, name: string): MaxOccurs {
    if (text === undefined) return 1;
    if (text === "unbounded") return "unbounded";
    const value = Number(text);
    if (!Number.isInteger(value) || value < 1) this.fail(`invalid maxOccurs '${text}' on '${name}'`);
    return value;
  }

  private coerceDefaultOrFail(text: string, draft: DraftField): RequestValue {
    const value = coerceDefault(text, draft.type);
    if (value === undefined) this.fail(`default '${text}' is not valid for '${draft.name}'`);
    return value;
  }

  private rejectUnsupported(node: XmlNode): void {
    if (UNSUPPORTED.has(node.local)) this.fail(`unsupported construct <${node.tag}>`);
  }

  private fail(reason: string): never {
    throw new SchemaParseError(this.currentSource, reason);
  }
}

function empty(): Content {
  return { children: [], choices: [] };
}

function baseName(location: string): string {
  return location.split(/[\\/]/).pop() ?? location;
}

function isRepeatedText(text: string | undefined): boolean {
  return text === "unbounded" || (text !== undefined && Number(text) > 1);
}

// ── Entry point ─────────────────────────────────────────────────────────────

function parseDocument(source: XsdText): ParsedDocument {
  const valid = XMLValidator.validate(source.text);
  if (valid !== true) {
    throw new SchemaParseError(
      source.sourceName,
      `malformed XML at line ${valid.err.line}: ${valid.err.msg}`
    );
  }

  const root = toNodes(xmlParser.parse(source.text))[0];
  if (!root) throw new SchemaParseError(source.sourceName, "document has no root element");
  return { sourceName: source.sourceName, root };
}

/**
 * Parse the XSD/WSDL files of one API version together. Types and elements
 * from every file are visible to all of them, so a file may hold types only
 * and `include`/`import` resolve against the other files by name.
 * Throws SchemaParseError for malformed XML or unsupported schema content.
 */
export function parseXsdSources(sources: readonly XsdText[], options: XsdSetOptions): OperationSchema[] {
  return new XsdSchemaSet(sources.map(parseDocument), options).operations();
}

/** Parse a single self-contained XSD or WSDL document. */
export function parseXsdSource(text: string, options: XsdSourceOptions): OperationSchema[] {
  return parseXsdSources([{ text, sourceName: options.sourceName }], options);
}
