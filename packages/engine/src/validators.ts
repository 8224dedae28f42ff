import * as z from "zod";
import { ALL_ROOMS, type RoomId } from "./types/primitives.js";

const RoomIdSchema = z.custom<RoomId>(
  (value) => typeof value === "string" && ALL_ROOMS.some((room) => room === value),
  { message: `Expected one of ${ALL_ROOMS.join(", ")}` },
);

export const SideSchema = z.enum(["overlord", "champion"]);

const CardIdSchema = z.string().min(1);

export const RaidActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("activate_room") }),
  z.object({ type: z.literal("pass_activation") }),
  z.object({ type: z.literal("use_weapon"), weaponId: CardIdSchema }),
  z.object({ type: z.literal("no_weapon") }),
  z.object({ type: z.literal("retreat") }),
  z.object({ type: z.literal("score_card"), cardId: CardIdSchema }),
  z.object({ type: z.literal("end_raid") }),
]);

export const GameActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("DRAW_CARD") }),
  z.object({ type: z.literal("GAIN_MANA") }),
  z.object({ type: z.literal("PLAY_CARD"), cardId: CardIdSchema, room: RoomIdSchema.optional() }),
  z.object({
    type: z.literal("ACTIVATE_ABILITY"),
    abilityId: z.object({ cardId: CardIdSchema, index: z.number().int().nonnegative() }),
    room: RoomIdSchema.optional(),
  }),
  z.object({ type: z.literal("LEVEL_UP_ROOM"), room: RoomIdSchema }),
  z.object({ type: z.literal("INITIATE_RAID"), room: RoomIdSchema }),
  z.object({ type: z.literal("RAID_ACTION"), action: RaidActionSchema }),
  z.object({ type: z.literal("END_TURN") }),
]);

export const SubmitActionSchema = z.object({
  gameId: z.string().min(1),
  side: SideSchema,
  action: GameActionSchema,
  expectedVersion: z.number().int().nonnegative(),
});

export type SubmitActionRequest = z.infer<typeof SubmitActionSchema>;
