import type { TableSchema } from "./schema.js";

/** Small table exercising every column role. */
export const ITEMS_TABLE: TableSchema = {
  name: "items",
  columns: [
    { name: "id", type: "text", role: "key" },
    { name: "label", type: "text", role: "extracted" },
    { name: "score", type: "real", role: "extracted" },
    { name: "count", type: "integer", role: "extracted" },
    { name: "title", type: "text", role: "insert_only" },
    { name: "views", type: "integer", role: "preserved", default: "0" },
  ],
};
