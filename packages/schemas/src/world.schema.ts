const RoomSchema = {
  type: "object",
  required: ["description", "exits"],
  properties: {
    description: { type: "string", minLength: 1 },
    exits: { type: "object", additionalProperties: { type: "string", minLength: 1 } },
  },
  additionalProperties: false,
} as const;

const ItemSchema = {
  type: "object",
  required: ["name", "location"],
  properties: {
    name: { type: "string", minLength: 1 },
    aliases: { type: "array", items: { type: "string", minLength: 1 } },
    location: { type: "string", minLength: 1 },
    points: { type: "integer", minimum: 0 },
    fixed: { type: "boolean" },
  },
  additionalProperties: false,
} as const;

export const WorldSchema = {
  type: "object",
  required: ["title", "start", "final_room", "rooms", "items"],
  properties: {
    title: { type: "string", minLength: 1 },
    start: { type: "string", minLength: 1 },
    final_room: { type: "string", minLength: 1 },
    final_points: { type: "integer", minimum: 0 },
    rooms: { type: "object", minProperties: 1, additionalProperties: RoomSchema },
    items: { type: "array", items: ItemSchema },
  },
  additionalProperties: false,
} as const;
