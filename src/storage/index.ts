export type { DataStorage } from "./storage.js";
export { FileSystemStorage } from "./fs.js";
