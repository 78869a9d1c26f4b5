export * from "./gateway-server";
