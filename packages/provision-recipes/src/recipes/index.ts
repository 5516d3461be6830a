import type { Recipe } from '@sandbox-provision/engine';
import { djangoRecipe } from './django.js';
import { postgresqlRecipe } from './postgresql.js';
import { pydevRecipe } from './pydev.js';

export const RECIPES = {
  postgresql: postgresqlRecipe,
  django: djangoRecipe,
  pydev: pydevRecipe,
} satisfies Record<string, Recipe>;

export type RecipeName = keyof typeof RECIPES;

export const RECIPE_NAMES: RecipeName[] = ['postgresql', 'django', 'pydev'];

export function isRecipeName(name: string): name is RecipeName {
  return Object.prototype.hasOwnProperty.call(RECIPES, name);
}

export * from './common.js';
export * from './django.js';
export * from './postgresql.js';
export * from './pydev.js';
