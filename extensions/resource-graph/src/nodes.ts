/**
 * Node Model
 *
 * Declared resources, typed references between them, and the declaration
 * set that guarantees identity uniqueness.
 */

import { DeclarationError, DuplicateIdentityError } from "./errors.js";
import type {
  AttributeValue,
  Attributes,
  NodeIdentity,
  NodeOptions,
  OutputDeclaration,
  ResourceNode,
} from "./types.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

// =============================================================================
// Identity
// =============================================================================

export function formatAddress(kind: string, name: string): string {
  return `${kind}.${name}`;
}

/** Parse `kind.name` into an identity. */
export function parseAddress(address: string): NodeIdentity {
  const parts = address.split(".");
  if (parts.length !== 2 || !IDENTIFIER.test(parts[0]) || !IDENTIFIER.test(parts[1])) {
    throw new DeclarationError(`Invalid resource address "${address}"`);
  }
  return { kind: parts[0], name: parts[1] };
}

function assertIdentity(kind: string, name: string): void {
  if (!IDENTIFIER.test(kind)) throw new DeclarationError(`Invalid resource kind "${kind}"`);
  if (!IDENTIFIER.test(name)) throw new DeclarationError(`Invalid resource name "${name}"`);
}

// =============================================================================
// Reference
// =============================================================================

/**
 * Placeholder for another node's field. Resolved into a graph edge at build
 * time and into a concrete value at apply time.
 */
export class Reference {
  readonly kind: string;
  readonly name: string;
  /** Dot-separated path into the target's attributes. */
  readonly field: string;

  constructor(kind: string, name: string, field: string) {
    assertIdentity(kind, name);
    if (field.length === 0 || field.split(".").some((segment) => segment.length === 0)) {
      throw new DeclarationError(`Invalid reference field "${field}" on ${formatAddress(kind, name)}`);
    }
    this.kind = kind;
    this.name = name;
    this.field = field;
  }

  get address(): string {
    return formatAddress(this.kind, this.name);
  }

  toString(): string {
    return `${this.address}.${this.field}`;
  }

  toJSON(): { $ref: string } {
    return { $ref: this.toString() };
  }

  /** Parse `kind.name.field[.more]`. */
  static parse(expression: string): Reference {
    const parts = expression.split(".");
    if (parts.length < 3) {
      throw new DeclarationError(`Invalid reference "${expression}", expected kind.name.field`);
    }
    return new Reference(parts[0], parts[1], parts.slice(2).join("."));
  }
}

export function ref(kind: string, name: string, field: string): Reference {
  return new Reference(kind, name, field);
}

export function isReference(value: unknown): value is Reference {
  return value instanceof Reference;
}

/** Walk a value and collect every reference with the attribute path it sits at. */
export function collectReferences(
  value: AttributeValue,
  path = "",
): Array<{ path: string; reference: Reference }> {
  if (value instanceof Reference) return [{ path, reference: value }];
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => collectReferences(item, path ? `${path}.${i}` : String(i)));
  }
  if (value !== null && typeof value === "object") {
    return Object.entries(value).flatMap(([key, item]) => collectReferences(item, path ? `${path}.${key}` : key));
  }
  return [];
}

// =============================================================================
// Declaration Set
// =============================================================================

export class DeclarationSet {
  private nodesByAddress = new Map<string, ResourceNode>();
  private outputsByName = new Map<string, OutputDeclaration>();

  /**
   * Declare a node. Fails if `(kind, name)` was already declared.
   */
  defineNode(kind: string, name: string, attributes: Attributes, options: NodeOptions = {}): ResourceNode {
    assertIdentity(kind, name);
    const address = formatAddress(kind, name);
    if (this.nodesByAddress.has(address)) {
      throw new DuplicateIdentityError(address);
    }

    const dependsOn: string[] = [];
    for (const dep of options.dependsOn ?? []) {
      assertIdentity(dep.kind, dep.name);
      const depAddress = formatAddress(dep.kind, dep.name);
      if (!dependsOn.includes(depAddress)) dependsOn.push(depAddress);
    }

    const node: ResourceNode = {
      kind,
      name,
      address,
      mode: options.mode ?? "managed",
      attributes,
      dependsOn,
    };
    this.nodesByAddress.set(address, node);
    return node;
  }

  defineOutput(name: string, value: AttributeValue, options: { sensitive?: boolean; description?: string } = {}): OutputDeclaration {
    if (!IDENTIFIER.test(name)) throw new DeclarationError(`Invalid output name "${name}"`);
    if (this.outputsByName.has(name)) throw new DeclarationError(`Output "${name}" is declared more than once`);
    const output: OutputDeclaration = {
      name,
      value,
      sensitive: options.sensitive ?? false,
      ...(options.description !== undefined ? { description: options.description } : {}),
    };
    this.outputsByName.set(name, output);
    return output;
  }

  get(address: string): ResourceNode | undefined {
    return this.nodesByAddress.get(address);
  }

  has(address: string): boolean {
    return this.nodesByAddress.has(address);
  }

  /** Nodes in declaration order. */
  nodes(): ResourceNode[] {
    return [...this.nodesByAddress.values()];
  }

  outputs(): OutputDeclaration[] {
    return [...this.outputsByName.values()];
  }

  get size(): number {
    return this.nodesByAddress.size;
  }
}
