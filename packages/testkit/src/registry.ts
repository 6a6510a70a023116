/**
 * Reference document types shared by the SDK and CLI tests
 */

import { DataTypes, createDocumentTypeRegistry, defineDocumentType } from "@docfeed/sdk";
import type { DocumentType, DocumentTypeDefinition, DocumentTypeRegistryImpl } from "@docfeed/sdk";

const CONTACT = DataTypes.struct("contact", {
  email: DataTypes.STRING,
  phone: DataTypes.STRING,
});

/**
 * Every field type the decoders support, spread over a few document types
 */
export const TEST_TYPES: readonly DocumentType[] = [
  defineDocumentType("article", {
    title: DataTypes.STRING,
    body: DataTypes.STRING,
    views: DataTypes.INT,
    published: DataTypes.BOOL,
    score: DataTypes.DOUBLE,
    rating: DataTypes.FLOAT,
    visits: DataTypes.LONG,
    level: DataTypes.BYTE,
  }),
  defineDocumentType("profile", {
    contact: CONTACT,
    home: DataTypes.POSITION,
  }),
  defineDocumentType("collection", {
    items: DataTypes.array(DataTypes.STRING),
    numbers: DataTypes.array(DataTypes.INT),
    tags: DataTypes.weightedSet(DataTypes.STRING),
    labels: DataTypes.map(DataTypes.STRING, DataTypes.STRING),
    groups: DataTypes.map(DataTypes.STRING, DataTypes.array(DataTypes.INT)),
    ranks: DataTypes.map(DataTypes.INT, DataTypes.DOUBLE),
    contacts: DataTypes.array(CONTACT),
  }),
  defineDocumentType("attachment", {
    payload: DataTypes.RAW,
  }),
  defineDocumentType("embedding", {
    sparse: DataTypes.tensor("tensor(x{},y{})"),
    dense: DataTypes.tensor("tensor(x[],y[])"),
    fixed: DataTypes.tensor("tensor<float>(x[3])"),
    mixed: DataTypes.tensor("tensor(cat{},pos[2])"),
  }),
  defineDocumentType("rule", {
    filter: DataTypes.PREDICATE,
  }),
];

/**
 * Registry holding TEST_TYPES
 */
export function createTestRegistry(): DocumentTypeRegistryImpl {
  return createDocumentTypeRegistry([...TEST_TYPES]);
}

/**
 * Definition files for a type directory, keyed by file name
 */
export const TEST_DEFINITION_FILES: Record<string, DocumentTypeDefinition> = {
  "article.json": {
    name: "article",
    description: "Articles with primitive fields",
    fields: {
      title: "string",
      views: "int",
      published: "bool",
      visits: "long",
    },
  },
  "collection.json": {
    name: "collection",
    structs: {
      contact: { email: "string", phone: "string" },
    },
    fields: {
      items: "array<string>",
      tags: "weightedset<string>",
      labels: "map<string,string>",
      contacts: "array<contact>",
    },
  },
  "embedding.json": {
    name: "embedding",
    fields: {
      sparse: "tensor(x{},y{})",
      fixed: "tensor<float>(x[3])",
    },
  },
};
