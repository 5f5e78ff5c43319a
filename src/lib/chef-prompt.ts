/**
 * Chef prompt sent to Gemini for every recipe request.
 */
import type { UserSelection } from "./types.js";

export function buildChefPrompt(selection: UserSelection): string {
  const {
    cuisine,
    dietaryPreference,
    allergy,
    ingredient1,
    ingredient2,
    ingredient3,
    winePreference,
  } = selection;

  return `I am a Chef.  I need to create ${cuisine}
recipes for customers who want ${dietaryPreference} meals.
However, don't include recipes that use ingredients with the customer's ${allergy} allergy.
I have ${ingredient1},
${ingredient2},
and ${ingredient3}
in my kitchen and other ingredients.
The customer's wine preference is ${winePreference}
Please provide some for meal recommendations.
For each recommendation include preparation instructions,
time to prepare
and the recipe title at the beginning of the response.
Then include the wine paring for each recommendation.
At the end of the recommendation provide the calories associated with the meal
and the nutritional facts.
`;
}
