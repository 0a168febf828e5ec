export * from "./httpSession";
