export * from "./capability-table";
export * from "./tracker";
