export * from "./rate-limit-counters.js";
