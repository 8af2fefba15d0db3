export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/maze";
export * from "./types/error";
export * from "./types/result";
