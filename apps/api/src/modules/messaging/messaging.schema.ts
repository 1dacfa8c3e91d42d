import { z } from "zod";
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MEDIA_TYPES,
  SYNC_SCOPES,
} from "../../lib/constants.js";

export const ConfigurationParamsSchema = z.object({
  id: z.string().min(1),
});

export const GroupParamsSchema = z.object({
  id: z.string().min(1),
  groupId: z.string().min(1),
});

export const MemberParamsSchema = z.object({
  id: z.string().min(1),
  groupId: z.string().min(1),
  contactId: z.string().min(1),
});

export const SendTextSchema = z.object({
  to: z.string().trim().min(1, "to is required"),
  body: z.string().min(1, "body is required").max(4096),
});

export const SendMediaSchema = z.object({
  to: z.string().trim().min(1, "to is required"),
  mediaBase64: z
    .string()
    .min(1, "mediaBase64 is required")
    .base64("mediaBase64 must be base64"),
  filename: z.string().trim().min(1).max(255),
  mediaType: z.enum(MEDIA_TYPES),
  caption: z.string().max(1024).optional(),
});

export const CreateGroupSchema = z.object({
  name: z.string().trim().min(1).max(100),
  participants: z.array(z.string().trim().min(1)).min(1, "at least one participant"),
});

export const SyncRequestSchema = z.object({
  scope: z.enum(SYNC_SCOPES).default("all"),
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

export const ListQuerySchema = z.object({
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export const MessagesQuerySchema = ListQuerySchema.extend({
  chatId: z.string().trim().min(1).optional(),
});

export const StatsQuerySchema = z.object({
  sinceHours: z.coerce.number().positive().max(24 * 90).default(24),
});

export type SendTextInput = z.infer<typeof SendTextSchema>;
export type SendMediaBody = z.infer<typeof SendMediaSchema>;
export type CreateGroupInput = z.infer<typeof CreateGroupSchema>;
export type SyncRequest = z.infer<typeof SyncRequestSchema>;
export type ListQuery = z.infer<typeof ListQuerySchema>;
export type MessagesQuery = z.infer<typeof MessagesQuerySchema>;
