/**
 * Catalog sample controller: a self-referential category tree
 */

import { defineClass, t } from '../host-types.js';
import type { ClassType } from '../types/host.js';
import type { ControllerDescriptor } from '../controller-source.js';

export interface Category {
  name: string;
  parent?: Category;
  children?: Category[];
}

export const CategoryType: ClassType = defineClass('Category', {
  properties: () => [
    { name: 'name', type: t.string(), required: true },
    { name: 'parent', type: t.object(CategoryType, { nullable: true }) },
    { name: 'children', type: t.arrayOf(t.object(CategoryType), { nullable: true }) },
  ],
});

function countCategories(category: Category): number {
  return 1 + (category.children ?? []).reduce((sum, child) => sum + countCategories(child), 0);
}

export class CatalogController {
  describe(category: Category): { name: string; path: string; size: number } {
    const names: string[] = [];
    let current: Category | undefined = category;
    while (current) {
      names.unshift(current.name);
      current = current.parent;
    }
    return { name: category.name, path: names.join(' / '), size: countCategories(category) };
  }
}

export const catalogController: ControllerDescriptor = {
  name: 'CatalogController',
  route: 'api/catalog',
  actions: [
    {
      method: 'describe',
      name: 'DescribeCategory',
      description: 'Describes a category with its ancestors and descendants',
      httpMethod: 'POST',
      parameters: [{ name: 'category', type: t.object(CategoryType) }],
    },
  ],
};
