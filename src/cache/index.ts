export * from "./schema-cache";
