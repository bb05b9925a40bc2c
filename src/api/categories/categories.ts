import { Request } from 'express';
import { z } from 'zod';
import type { Repository } from '../../utils/io/types';
import type { Category } from '../../data/category/types';
import { getBody, getIdParam, getUserId } from '../../utils/net/request';
import { getOwnedCategory } from '../access';

const categorySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
});

export async function getCategories(request: Request, repository: Repository): Promise<Category[]> {
  return repository.listCategories(getUserId(request));
}

export async function getCategory(request: Request, repository: Repository): Promise<Category> {
  return getOwnedCategory(repository, getUserId(request), getIdParam(request, 'categoryId'));
}

export async function addCategory(request: Request, repository: Repository): Promise<Category> {
  const { name } = getBody(request, categorySchema);
  return repository.createCategory({ userId: getUserId(request), name });
}

/**
 * Renames a category
 * @throws NotFoundError if the category is not the user's
 */
export async function renameCategory(request: Request, repository: Repository): Promise<Category> {
  const category = await getOwnedCategory(repository, getUserId(request), getIdParam(request, 'categoryId'));
  const { name } = getBody(request, categorySchema);
  return repository.updateCategory(category.id, { name });
}

/**
 * Archives a category. Archived categories disappear from the list but keep
 * their transactions and savings balance.
 */
export async function archiveCategory(request: Request, repository: Repository) {
  const category = await getOwnedCategory(repository, getUserId(request), getIdParam(request, 'categoryId'));
  await repository.updateCategory(category.id, { isActive: false });
  return { ok: true };
}
