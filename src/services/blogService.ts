/**
 * blogService.ts - Blog posts, seeded with demo content on first read.
 */

import type { RecordStore } from '../store/recordStore';
import type { BlogRecord, NewRecord } from '../types/domain';
import { type ItemsResult, listOrDegrade } from './storeOutage';

export const BLOG_LIMIT = 20;

export const DEMO_POSTS: readonly NewRecord<'blog'>[] = [
  {
    title: 'AI for Food Redistribution',
    excerpt: 'How ML reduces waste',
    body: '...',
    tags: ['ai', 'sustainability'],
  },
  {
    title: 'Food Safety 101',
    excerpt: 'Best practices for handling surplus',
    body: '...',
    tags: ['safety'],
  },
];

async function readOrSeed(store: RecordStore): Promise<BlogRecord[]> {
  let posts = await store.fetchAll('blog');

  if (posts.length === 0) {
    for (const post of DEMO_POSTS) {
      await store.create('blog', { ...post, tags: [...post.tags] });
    }
    posts = await store.fetchAll('blog');
    console.log(`[Blog] Seeded ${posts.length} demo posts`);
  }

  return posts.slice(0, BLOG_LIMIT);
}

export async function listBlogPosts(store: RecordStore): Promise<ItemsResult<BlogRecord>> {
  return listOrDegrade(store, 'Blog', () => readOrSeed(store));
}
