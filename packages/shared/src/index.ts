export * from "./review-model";
export * from "./utils";
