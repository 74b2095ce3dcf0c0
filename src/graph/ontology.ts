export const ENTITY_TYPE_NAMES = ["Person", "Place", "Symbol", "Concept", "TechnicalArtifact"] as const;

export type EntityTypeName = (typeof ENTITY_TYPE_NAMES)[number];

export const ENTITY_TYPES: Record<EntityTypeName, string> = {
  Person: "A human or agent who takes part in conversations or is talked about by name.",
  Place: "A physical or virtual location where things happen: a room, a city, a channel, a shared space.",
  Symbol: "An object or image that carries recurring emotional or relational meaning.",
  Concept: "An idea, practice, feeling or abstract topic that recurs across conversations.",
  TechnicalArtifact: "A piece of software, file, tool, service, repository or hardware that is built or used.",
};

export const EDGE_TYPES: Record<string, string> = {
  LOVES: "Deep affection between two people.",
  CARES_FOR: "Looks after or is protective of someone or something.",
  KNOWS: "Has met or regularly talks with another person.",
  WORKS_ON: "Actively develops or maintains an artifact or concept.",
  CREATED: "Brought something into being.",
  USES: "Relies on a tool or artifact.",
  DEPENDS_ON: "One artifact requires another to function.",
  PART_OF: "Is a component or member of something larger.",
  LIVES_IN: "Resides in a place.",
  LOCATED_IN: "Is situated inside a place.",
  VISITED: "Spent time in a place.",
  SYMBOLIZES: "A symbol stands for a concept or relationship.",
  BELIEVES: "Holds a belief or value.",
  DECIDED: "Committed to a course of action.",
  LEARNED: "Gained understanding of a concept or artifact.",
  FEELS: "Experiences an emotion about something.",
};

const PERSON_EDGES = ["LOVES", "CARES_FOR", "KNOWS"];
const MAKING_EDGES = ["WORKS_ON", "CREATED", "USES", "LEARNED"];

/** Allowed predicates per (source type, target type). Pairs not listed fall back to free-form. */
export const EDGE_TYPE_MAP: Array<{ source: EntityTypeName; target: EntityTypeName; edges: string[] }> = [
  { source: "Person", target: "Person", edges: PERSON_EDGES },
  { source: "Person", target: "TechnicalArtifact", edges: MAKING_EDGES },
  { source: "Person", target: "Concept", edges: ["BELIEVES", "DECIDED", "LEARNED", "FEELS", "WORKS_ON"] },
  { source: "Person", target: "Place", edges: ["LIVES_IN", "VISITED", "CREATED"] },
  { source: "Person", target: "Symbol", edges: ["CREATED", "CARES_FOR", "FEELS"] },
  { source: "Symbol", target: "Concept", edges: ["SYMBOLIZES"] },
  { source: "Symbol", target: "Person", edges: ["SYMBOLIZES"] },
  { source: "TechnicalArtifact", target: "TechnicalArtifact", edges: ["DEPENDS_ON", "PART_OF"] },
  { source: "Place", target: "Place", edges: ["PART_OF", "LOCATED_IN"] },
  { source: "Symbol", target: "Place", edges: ["LOCATED_IN"] },
];

export function isEntityTypeName(value: string): value is EntityTypeName {
  return ENTITY_TYPE_NAMES.some((name) => name === value);
}

export function normalizePredicate(predicate: string): string {
  return predicate
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toUpperCase();
}
