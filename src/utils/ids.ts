/**
 * Branded Telegram identifiers.
 *
 * Community (chat) ids and user ids are both plain integers on the wire; the brands
 * keep them from being swapped when they flow through the ledger. JSON object keys
 * carry them as decimal strings, so each brand also has a key parser.
 *
 * @module utils/ids
 */

import { z } from "zod";

const integerKey = z
	.string()
	.regex(/^(0|-?[1-9]\d*)$/, "must be a canonical decimal integer")
	.transform(Number);

export const CommunityIdSchema = z.number().int().safe().brand<"CommunityId">();
export const SubjectIdSchema = z.number().int().safe().brand<"SubjectId">();
export const ModeratorIdSchema = z.number().int().safe().brand<"ModeratorId">();
export const ChannelIdSchema = z.number().int().safe().brand<"ChannelId">();

/** Telegram chat id of a group or supergroup */
export type CommunityId = z.infer<typeof CommunityIdSchema>;
/** Telegram user id of the member being moderated */
export type SubjectId = z.infer<typeof SubjectIdSchema>;
/** Telegram user id of the member issuing a moderation command */
export type ModeratorId = z.infer<typeof ModeratorIdSchema>;
/** Telegram chat id that receives audit messages */
export type ChannelId = z.infer<typeof ChannelIdSchema>;

export const communityId = (id: number): CommunityId => CommunityIdSchema.parse(id);
export const subjectId = (id: number): SubjectId => SubjectIdSchema.parse(id);
export const moderatorId = (id: number): ModeratorId => ModeratorIdSchema.parse(id);
export const channelId = (id: number): ChannelId => ChannelIdSchema.parse(id);

export const CommunityKeySchema = integerKey.pipe(CommunityIdSchema);
export const SubjectKeySchema = integerKey.pipe(SubjectIdSchema);
