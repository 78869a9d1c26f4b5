export * from "./bm25";
export * from "./regex";
export * from "./search-index";
