import { describe, it, expect } from "vitest";
import { getAllCategories, getCategoryInfo, severityRank } from "../categories.js";
import { CategorySchema } from "../../schemas.js";

describe("category registry", () => {
  it("describes every category once, in declaration order", () => {
    expect(getAllCategories().map((c) => c.id)).toEqual(CategorySchema.options);
  });

  it("assigns severities by confidence of the match", () => {
    expect(getCategoryInfo("DirectQueryInClause").severity).toBe("high");
    expect(getCategoryInfo("RowLikeResult").severity).toBe("high");
    expect(getCategoryInfo("QueryAttributeInClause").severity).toBe("medium");
    expect(getCategoryInfo("PossibleRowAttribute").severity).toBe("low");
    expect(getCategoryInfo("SubqueryAlreadyGuarded").severity).toBe("info");
  });

  it("tags each category with the classifier that produces it", () => {
    const bySource = getAllCategories().filter((c) => c.source === "comparison").map((c) => c.id);
    expect(bySource).toEqual(["RowLikeResult", "PossibleRowVariable", "PossibleRowAttribute"]);
  });

  it("ranks critical first and info last", () => {
    expect(severityRank("critical")).toBe(0);
    expect(severityRank("info")).toBe(4);
  });
});
