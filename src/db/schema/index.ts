export * from "./campaigns.js";
