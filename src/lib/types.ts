export const CUISINES = [
  "American",
  "Chinese",
  "French",
  "Indian",
  "Italian",
  "Japanese",
  "Mexican",
  "Turkish",
] as const;

export const DIETARY_PREFERENCES = [
  "Diabetes",
  "Gluten free",
  "Halal",
  "Keto",
  "Kosher",
  "Lactose Intolerance",
  "Paleo",
  "Vegan",
  "Vegetarian",
  "None",
] as const;

export const WINE_PREFERENCES = ["Red", "White", "None"] as const;

export type Cuisine = (typeof CUISINES)[number];
export type DietaryPreference = (typeof DIETARY_PREFERENCES)[number];
export type WinePreference = (typeof WINE_PREFERENCES)[number];

/**
 * Everything the form collects for one submission. Values are free text:
 * the option lists above only drive the widgets.
 */
export interface UserSelection {
  cuisine: string;
  dietaryPreference: string;
  allergy: string;
  ingredient1: string;
  ingredient2: string;
  ingredient3: string;
  winePreference: string;
}

export type TextField = "allergy" | "ingredient1" | "ingredient2" | "ingredient3";
export type SelectField = Exclude<keyof UserSelection, TextField>;

export const SELECTION_DEFAULTS: Record<TextField, string> = {
  allergy: "peanuts",
  ingredient1: "ahi tuna",
  ingredient2: "chicken breast",
  ingredient3: "tofu",
};

export interface ChefOptions {
  cuisines: readonly Cuisine[];
  dietaryPreferences: readonly DietaryPreference[];
  winePreferences: readonly WinePreference[];
  defaults: Record<TextField, string>;
}

export interface RecipeResult {
  recipes: string;
  /** `recipes` rendered from Markdown; "" when nothing was generated. */
  recipesHtml: string;
  prompt: string;
}
