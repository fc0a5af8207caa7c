export * from "./utils/vim";
