import { describe, expect, it } from "vitest";

import { renderRecipesHtml } from "../../lib/recipe-markdown.js";

describe("renderRecipesHtml", () => {
  it("renders headings, emphasis and lists", () => {
    const html = renderRecipesHtml(
      "## Seared Ahi Tuna\n\n**Prep time:** 20 minutes\n\n- ahi tuna\n- sesame seeds"
    );

    expect(html).toContain("<h2>Seared Ahi Tuna</h2>");
    expect(html).toContain("<p><strong>Prep time:</strong> 20 minutes</p>");
    expect(html).toContain("<li>ahi tuna</li>");
    expect(html).toContain("<li>sesame seeds</li>");
  });

  it("renders nutrition tables", () => {
    const html = renderRecipesHtml("| Calories | Protein |\n| --- | --- |\n| 420 | 38g |");

    expect(html).toContain("<th>Calories</th>");
    expect(html).toContain("<td>38g</td>");
  });

  it("escapes raw HTML in the reply", () => {
    const html = renderRecipesHtml("<script>alert(1)</script>");

    expect(html).not.toContain("<script>");
    expect(html).toContain("&lt;script&gt;");
  });

  it("returns an empty string when nothing was generated", () => {
    expect(renderRecipesHtml("")).toBe("");
    expect(renderRecipesHtml("   ")).toBe("");
  });
});
