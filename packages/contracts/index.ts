export * from "./core/offset";

// Payload capability interface
export * from "./payload/payload";

export * from "./errors/errors";
