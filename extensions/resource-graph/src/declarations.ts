/**
 * Declaration Loader
 *
 * Reads a JSON declaration document into a DeclarationSet. References are
 * written as `{"$ref": "kind.name.field"}` and decoded into Reference
 * placeholders.
 */

import * as fs from "node:fs/promises";
import { z } from "zod";
import { DeclarationError, errorMessage } from "./errors.js";
import { DeclarationSet, Reference, parseAddress } from "./nodes.js";
import { concreteValueSchema } from "./state.js";
import type { AttributeValue, Attributes, ConcreteValue } from "./types.js";

// =============================================================================
// Document Schema
// =============================================================================

const resourceDeclarationSchema = z
  .object({
    kind: z.string().min(1),
    name: z.string().min(1),
    mode: z.enum(["managed", "data"]).optional(),
    attributes: z.record(z.string(), concreteValueSchema).default({}),
    dependsOn: z.array(z.string()).optional(),
  })
  .strict();

const outputDeclarationSchema = z
  .object({
    value: concreteValueSchema,
    sensitive: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

export const declarationDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    resources: z.array(resourceDeclarationSchema),
    outputs: z.record(z.string(), outputDeclarationSchema).default({}),
  })
  .strict();

export type DeclarationDocument = z.input<typeof declarationDocumentSchema>;

// =============================================================================
// Reference Decoding
// =============================================================================

const REF_KEY = "$ref";

/** Replace every `{"$ref": "..."}` object with a Reference. */
export function decodeValue(value: ConcreteValue, path: string): AttributeValue {
  if (Array.isArray(value)) return value.map((item, i) => decodeValue(item, `${path}.${i}`));
  if (value === null || typeof value !== "object") return value;

  if (Object.prototype.hasOwnProperty.call(value, REF_KEY)) {
    const target = value[REF_KEY];
    if (Object.keys(value).length !== 1 || typeof target !== "string") {
      throw new DeclarationError(`Invalid reference at ${path}`, [
        `a reference is an object with a single "${REF_KEY}" string, e.g. {"${REF_KEY}": "aws_vpc.main.id"}`,
      ]);
    }
    return Reference.parse(target);
  }

  const out: { [key: string]: AttributeValue } = {};
  for (const [key, item] of Object.entries(value)) out[key] = decodeValue(item, `${path}.${key}`);
  return out;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build a declaration set from a JSON string or an already parsed document.
 *
 * @throws DeclarationError for malformed documents and references.
 * @throws DuplicateIdentityError if an address is declared twice.
 */
export function parseDeclarationDocument(input: string | unknown): DeclarationSet {
  let raw: unknown = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw new DeclarationError("Declaration document is not valid JSON", [errorMessage(err)]);
    }
  }

  const parsed = declarationDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DeclarationError(
      "Invalid declaration document",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const set = new DeclarationSet();
  for (const resource of parsed.data.resources) {
    const base = `${resource.kind}.${resource.name}`;
    const attributes: Attributes = {};
    for (const [key, value] of Object.entries(resource.attributes)) {
      attributes[key] = decodeValue(value, `${base}.${key}`);
    }
    set.defineNode(resource.kind, resource.name, attributes, {
      ...(resource.mode ? { mode: resource.mode } : {}),
      dependsOn: (resource.dependsOn ?? []).map(parseAddress),
    });
  }

  for (const [name, output] of Object.entries(parsed.data.outputs)) {
    set.defineOutput(name, decodeValue(output.value, `output.${name}`), {
      ...(output.sensitive !== undefined ? { sensitive: output.sensitive } : {}),
      ...(output.description !== undefined ? { description: output.description } : {}),
    });
  }

  return set;
}

export async function loadDeclarationFile(filePath: string): Promise<DeclarationSet> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new DeclarationError(`Cannot read declaration file ${filePath}`, [errorMessage(err)]);
  }
  return parseDeclarationDocument(content);
}
