import { describe, expect, it, vi } from "vitest";
import { toCommandPayload } from "../commands/definitions";
import { InteractionDispatcher } from "../dispatch/engine";
import { InteractionContext } from "../interactions/context";
import { HandlerRegistry } from "../registry/registry";
import { TEST_CREDENTIALS, buildEvent, captureLogger, commandContext, componentContext, modalContext } from "../testing/fixtures";
import { sampleHandlers } from "./sampleHandlers";

function setup() {
  const registry = new HandlerRegistry();
  for (const init of sampleHandlers.registrations) registry.register(init);
  const followups = { editOriginalResponse: vi.fn(async () => null), sendFollowupMessage: vi.fn(async () => null) };
  const dispatcher = new InteractionDispatcher({
    registry,
    followups,
    defaults: { enabled: false, timeoutMs: 2000, ephemeral: false },
    logger: captureLogger().logger,
  });
  return { dispatcher, followups, registry };
}

describe("sampleHandlers", () => {
  it("describes every named command for syncing", () => {
    const { registry } = setup();
    const payloads = registry.commandDefinitions().map(toCommandPayload);

    expect(payloads.map((p) => p.name)).toEqual(["hello", "poll", "report", "status", "colour", "Wave at", "feedback"]);
    expect(payloads.find((p) => p.name === "colour")).toEqual({
      name: "colour",
      type: 1,
      description: "Pick a colour",
      options: [{ type: 3, name: "name", description: "Colour name", required: true, autocomplete: true }],
      default_permission: true,
    });
    expect(payloads.find((p) => p.name === "Wave at")).toEqual({ name: "Wave at", type: 2, default_permission: true });
  });

  it("offers vote buttons whose custom ids route back to the vote handler", async () => {
    const { dispatcher } = setup();

    const poll = await dispatcher.dispatch(commandContext("poll"));
    expect(poll).toMatchObject({
      response: {
        data: {
          components: [
            {
              components: [{ custom_id: "vote:lunch:1" }, { custom_id: "vote:lunch:2", style: 2 }],
            },
          ],
        },
      },
    });

    const vote = await dispatcher.dispatch(componentContext("vote:lunch:2"));
    expect(vote).toMatchObject({
      response: { type: 4, data: { content: "Vote for option 2 recorded", flags: 64 } },
    });
  });

  it("filters colours by the focused option", async () => {
    const { dispatcher } = setup();
    const ctx = new InteractionContext(
      buildEvent({
        kind: "autocomplete",
        id: "cmd-1",
        name: "colour",
        commandType: 1,
        options: [],
        focused: { name: "name", type: 3, value: "Bl", focused: true },
      }),
    );

    expect(await dispatcher.dispatch(ctx)).toMatchObject({
      response: { type: 8, data: { choices: [{ name: "blue", value: "blue" }] } },
    });
  });

  it("acknowledges the report and fills it in later", async () => {
    const { dispatcher, followups } = setup();
    const result = await dispatcher.dispatch(commandContext("report"));
    expect(result).toMatchObject({ kind: "deferred", response: { type: 5 } });
    if (result.kind === "not_found") throw new Error("expected a response");

    result.delivered();
    await dispatcher.supervisor.drain();

    expect(followups.editOriginalResponse).toHaveBeenCalledWith(TEST_CREDENTIALS, {
      embeds: [{ title: "Report", fields: [{ name: "Status", value: "ready", inline: false }] }],
    });
  });

  it("sends a follow-up after the status reply", async () => {
    const { dispatcher, followups } = setup();
    const result = await dispatcher.dispatch(commandContext("status"));
    if (result.kind === "not_found") throw new Error("expected a response");
    result.delivered();
    await dispatcher.supervisor.drain();

    expect(followups.sendFollowupMessage).toHaveBeenCalledWith(TEST_CREDENTIALS, {
      content: "Checked on behalf of tester",
    });
  });

  it("opens the feedback modal and thanks the submitter", async () => {
    const { dispatcher } = setup();

    expect(await dispatcher.dispatch(commandContext("feedback"))).toMatchObject({
      response: { type: 9, data: { custom_id: "feedback_form", title: "Feedback" } },
    });
    expect(await dispatcher.dispatch(modalContext("feedback_form", { body: "More colours" }))).toMatchObject({
      response: { type: 4, data: { content: "Thanks, we got: More colours" } },
    });
  });
});
