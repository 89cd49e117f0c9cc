export * from "./types";
export * from "./date-normalizer";
export * from "./description-formatter";
export * from "./field-merger";
export * from "./messages";
