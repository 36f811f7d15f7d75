// Tree
export * from "./tree";

// Verticalities
export * from "./verticality";

// Reference payloads
export * from "./payloads";
