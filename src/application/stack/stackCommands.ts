import { z } from 'zod';

const bare = <T extends string>(command: T) => z.object({ command: z.literal(command) });

/**
 * Commands accepted by a media stack, as sent over the HTTP API.
 */
export const stackCommandSchema = z.discriminatedUnion('command', [
  bare('turn_on'),
  bare('turn_off'),
  z.object({ command: z.literal('volume_set'), level: z.number().min(0).max(1) }),
  z.object({ command: z.literal('volume_mute'), muted: z.boolean() }),
  bare('volume_up'),
  bare('volume_down'),
  bare('media_play'),
  bare('media_pause'),
  bare('media_play_pause'),
  bare('media_stop'),
  bare('media_next_track'),
  bare('media_previous_track'),
  z.object({ command: z.literal('media_seek'), position: z.number().min(0) }),
  bare('clear_playlist'),
  z.object({ command: z.literal('shuffle_set'), shuffle: z.boolean() }),
  z.object({ command: z.literal('select_source'), source: z.string().min(1) }),
  z.object({
    command: z.literal('play_media'),
    contentType: z.string().min(1),
    contentId: z.string().min(1),
  }),
]);

export type StackCommand = z.infer<typeof stackCommandSchema>;

