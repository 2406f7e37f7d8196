import { describe, expect, it } from "vitest";
import { normalizeInteraction } from "./normalizeInteraction";

const envelope = {
  id: "interaction-9",
  application_id: "app-1",
  token: "test-token",
  guild_id: "guild-1",
  channel_id: "channel-1",
  locale: "en-GB",
  member: { user: { id: "user-7", username: "member", global_name: "Member" }, roles: [] },
};

describe("normalizeInteraction", () => {
  it("decodes a slash command with nested options", () => {
    const result = normalizeInteraction({
      ...envelope,
      type: 2,
      data: {
        id: "cmd-1",
        name: "config",
        type: 1,
        options: [{ name: "set", type: 1, options: [{ name: "level", type: 4, value: 3 }] }],
      },
    });

    if (result.type !== "interaction") throw new Error("expected an interaction");
    expect(result.event).toMatchObject({
      id: "interaction-9",
      credentials: { applicationId: "app-1", token: "test-token" },
      guildId: "guild-1",
      channelId: "channel-1",
      locale: "en-GB",
      guildLocale: null,
      user: { id: "user-7", username: "member", globalName: "Member" },
    });
    expect(result.event.data).toEqual({
      kind: "command",
      id: "cmd-1",
      name: "config",
      commandType: 1,
      options: [
        { name: "set", type: 1, options: [{ name: "level", type: 4, value: 3 }] },
      ],
      targetId: undefined,
      resolved: undefined,
    });
  });

  it("decodes a user context command with its target", () => {
    const result = normalizeInteraction({
      ...envelope,
      member: undefined,
      user: { id: "user-2", username: "dm-user" },
      type: 2,
      data: { id: "cmd-2", name: "Inspect", type: 2, target_id: "user-3", resolved: { users: {} } },
    });

    if (result.type !== "interaction") throw new Error("expected an interaction");
    expect(result.event.user).toEqual({ id: "user-2", username: "dm-user", globalName: null });
    expect(result.event.data).toMatchObject({ kind: "command", commandType: 2, targetId: "user-3" });
  });

  it("decodes a component press", () => {
    const result = normalizeInteraction({
      ...envelope,
      type: 3,
      message: { id: "msg-1" },
      data: { custom_id: "colour:pick", component_type: 3, values: ["red", 7] },
    });

    if (result.type !== "interaction") throw new Error("expected an interaction");
    expect(result.event.data).toEqual({
      kind: "component",
      customId: "colour:pick",
      componentType: 3,
      values: ["red"],
    });
    expect(result.event.message).toEqual({ id: "msg-1" });
  });

  it("finds the focused option of an autocomplete request", () => {
    const result = normalizeInteraction({
      ...envelope,
      type: 4,
      data: {
        id: "cmd-1",
        name: "colour",
        options: [{ name: "group", type: 2, options: [{ name: "shade", type: 3, value: "da", focused: true }] }],
      },
    });

    if (result.type !== "interaction") throw new Error("expected an interaction");
    expect(result.event.data).toMatchObject({
      kind: "autocomplete",
      name: "colour",
      commandType: 1,
      focused: { name: "shade", type: 3, value: "da", focused: true },
    });
  });

  it("collects submitted modal fields by custom id", () => {
    const result = normalizeInteraction({
      ...envelope,
      type: 5,
      data: {
        custom_id: "feedback:42",
        components: [
          { type: 1, components: [{ type: 4, custom_id: "title", value: "Great" }] },
          { type: 1, components: [{ type: 4, custom_id: "body", value: "Works well" }] },
        ],
      },
    });

    if (result.type !== "interaction") throw new Error("expected an interaction");
    expect(result.event.data).toEqual({
      kind: "modal",
      customId: "feedback:42",
      fields: { title: "Great", body: "Works well" },
    });
  });

  it("rejects unknown codes and missing fields", () => {
    expect(() => normalizeInteraction("nope")).toThrow("Interaction payload must be a JSON object");
    expect(() => normalizeInteraction({ ...envelope, type: 2 })).toThrow("Interaction data must be a JSON object");
    expect(() =>
      normalizeInteraction({ ...envelope, type: 3, data: { custom_id: "x", component_type: 99 } }),
    ).toThrow("Unknown component type 99");
    expect(() => normalizeInteraction({ ...envelope, token: undefined, type: 2, data: { id: "c", name: "n" } })).toThrow(
      "Missing interaction.token",
    );
  });
});
