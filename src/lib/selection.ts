import { SELECTION_DEFAULTS } from "./types.js";
import type { SelectField, TextField, UserSelection } from "./types.js";

const SELECT_FIELDS: SelectField[] = ["cuisine", "dietaryPreference", "winePreference"];
const TEXT_FIELDS: TextField[] = ["allergy", "ingredient1", "ingredient2", "ingredient3"];

export type SelectionResult =
  | { selection: UserSelection; error?: undefined }
  | { selection?: undefined; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a form submission. Unset selects become "", unset text inputs take
 * their widget default. Nothing is checked against the option lists.
 */
export function parseSelection(body: unknown): SelectionResult {
  const input = body ?? {};
  if (!isRecord(input)) {
    return { error: "Request body must be a JSON object" };
  }

  const read = (field: keyof UserSelection, fallback: string): string | null => {
    const value = input[field];
    if (value === undefined || value === null) return fallback;
    return typeof value === "string" ? value : null;
  };

  const selection: UserSelection = {
    cuisine: "",
    dietaryPreference: "",
    allergy: SELECTION_DEFAULTS.allergy,
    ingredient1: SELECTION_DEFAULTS.ingredient1,
    ingredient2: SELECTION_DEFAULTS.ingredient2,
    ingredient3: SELECTION_DEFAULTS.ingredient3,
    winePreference: "",
  };

  for (const field of SELECT_FIELDS) {
    const value = read(field, "");
    if (value === null) return { error: `Field '${field}' must be a string` };
    selection[field] = value;
  }

  for (const field of TEXT_FIELDS) {
    const value = read(field, SELECTION_DEFAULTS[field]);
    if (value === null) return { error: `Field '${field}' must be a string` };
    selection[field] = value;
  }

  return { selection };
}
