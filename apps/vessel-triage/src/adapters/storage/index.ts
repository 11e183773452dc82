export { ResultStore, type ResultFilter } from "./ResultStore.js";
