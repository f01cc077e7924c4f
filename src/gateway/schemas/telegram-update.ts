import { z } from "zod";

/**
 * The subset of a Telegram Update the relay reads. Unknown fields are stripped.
 */
const PhotoSizeSchema = z.object({
	file_id: z.string(),
	file_unique_id: z.string(),
	file_size: z.number().optional(),
	width: z.number().optional(),
	height: z.number().optional(),
});

const DocumentSchema = z.object({
	file_id: z.string(),
	file_unique_id: z.string(),
	file_name: z.string().optional(),
	mime_type: z.string().optional(),
	file_size: z.number().optional(),
});

const UserSchema = z.object({
	id: z.number(),
	is_bot: z.boolean().optional(),
	first_name: z.string().optional(),
	username: z.string().optional(),
});

export const TelegramMessageSchema = z.object({
	message_id: z.number(),
	chat: z.object({ id: z.number(), type: z.string().optional() }),
	from: UserSchema.optional(),
	text: z.string().optional(),
	caption: z.string().optional(),
	photo: z.array(PhotoSizeSchema).optional(),
	document: DocumentSchema.optional(),
});

export const TelegramUpdateSchema = z.object({
	update_id: z.number(),
	message: TelegramMessageSchema.optional(),
});

export type TelegramPhotoSize = z.infer<typeof PhotoSizeSchema>;
