/**
 * blogSchema.ts - Editorial posts shown on the landing page.
 */

import { HydratedDocument, InferSchemaType, Schema, model } from 'mongoose';
import { BlogRecord } from '../types/domain';

const blogSchema = new Schema({
  title: { type: String, required: true, trim: true },
  excerpt: { type: String, trim: true, default: null },
  body: { type: String, required: true },
  tags: { type: [String], default: [] }
}, {
  timestamps: true
});

export const BlogModel = model('Blog', blogSchema);

type BlogDocument = HydratedDocument<InferSchemaType<typeof blogSchema>>;

export function toBlogRecord(doc: BlogDocument): BlogRecord {
  return {
    id: doc._id.toString(),
    title: doc.title,
    excerpt: doc.excerpt ?? null,
    body: doc.body,
    tags: [...doc.tags],
    createdAt: doc.createdAt,
  };
}

export default blogSchema;
