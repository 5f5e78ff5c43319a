import { describe, expect, it } from "vitest";

import { buildChefPrompt } from "../../lib/chef-prompt.js";
import type { UserSelection } from "../../lib/types.js";

const selection: UserSelection = {
  cuisine: "Italian",
  dietaryPreference: "Vegan",
  allergy: "peanuts",
  ingredient1: "ahi tuna",
  ingredient2: "chicken breast",
  ingredient3: "tofu",
  winePreference: "red",
};

describe("buildChefPrompt", () => {
  it("fills the chef template in field order", () => {
    expect(buildChefPrompt(selection)).toBe(
      [
        "I am a Chef.  I need to create Italian",
        "recipes for customers who want Vegan meals.",
        "However, don't include recipes that use ingredients with the customer's peanuts allergy.",
        "I have ahi tuna,",
        "chicken breast,",
        "and tofu",
        "in my kitchen and other ingredients.",
        "The customer's wine preference is red",
        "Please provide some for meal recommendations.",
        "For each recommendation include preparation instructions,",
        "time to prepare",
        "and the recipe title at the beginning of the response.",
        "Then include the wine paring for each recommendation.",
        "At the end of the recommendation provide the calories associated with the meal",
        "and the nutritional facts.",
        "",
      ].join("\n")
    );
  });

  it("is deterministic", () => {
    expect(buildChefPrompt({ ...selection })).toBe(buildChefPrompt(selection));
  });

  it("embeds every value in cuisine-to-wine order", () => {
    const prompt = buildChefPrompt(selection);
    const positions = [
      "Italian",
      "Vegan",
      "peanuts",
      "ahi tuna",
      "chicken breast",
      "tofu",
      "wine preference is red",
    ].map((value) => prompt.indexOf(value));

    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("interpolates unset values as empty text", () => {
    const prompt = buildChefPrompt({
      ...selection,
      cuisine: "",
      dietaryPreference: "",
      winePreference: "",
    });

    expect(prompt.startsWith("I am a Chef.  I need to create \nrecipes for customers who want  meals.\n")).toBe(true);
    expect(prompt).toContain("The customer's wine preference is \nPlease provide");
  });

  it("passes values through verbatim", () => {
    const prompt = buildChefPrompt({ ...selection, allergy: "  tree nuts & {shellfish}" });
    expect(prompt).toContain("customer's   tree nuts & {shellfish} allergy.");
  });
});
