import { getAllCategories } from "@rowscope/engine";
import { formatCategoriesTable } from "../formatter.js";

export interface CategoriesOptions {
  noColor?: boolean;
}

export function runCategories(options: CategoriesOptions = {}): void {
  process.stdout.write(formatCategoriesTable(getAllCategories(), options.noColor));
}
