import { defineHandlerGroup } from "../app/handlerGroup";
import { OptionType } from "../commands/types";
import { CommandType } from "../interactions/types";
import { formatCustomId, parseCustomIdTemplate } from "../matching/customIdTemplate";
import { deferred, message, modal } from "../response/builders";
import { Button, ButtonStyle, Embed, TextInput, choice } from "../response/elements";

const VOTE_TEMPLATE = parseCustomIdTemplate("vote:{poll}:{choice:int}");
const COLOURS = ["red", "orange", "yellow", "green", "blue", "indigo", "violet"];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Handlers the bundled server loads; each shows one way of answering. */
export const sampleHandlers = defineHandlerGroup("samples", (g) => {
  g.command("hello", () => "world", { description: "Say hello" });

  g.command("poll", () => [
    "Which option do you prefer?",
    new Button({ label: "One", customId: formatCustomId(VOTE_TEMPLATE, { poll: "lunch", choice: 1 }) }),
    new Button({
      label: "Two",
      customId: formatCustomId(VOTE_TEMPLATE, { poll: "lunch", choice: 2 }),
      style: ButtonStyle.Secondary,
    }),
  ]);

  g.component(VOTE_TEMPLATE.source, (ctx) =>
    message({ content: `Vote for option ${String(ctx.params.choice)} recorded`, ephemeral: true }),
  );

  g.command("report", () =>
    deferred({
      continuation: async () => {
        await sleep(1000);
        return new Embed({ title: "Report" }).addField("Status", "ready");
      },
    }),
  );

  g.command(
    "status",
    () => "All systems nominal",
    { followup: (ctx) => `Checked on behalf of ${ctx.user?.username ?? "someone"}` },
  );

  g.command("colour", (ctx) => `You picked ${String(ctx.option("name") ?? "nothing")}`, {
    description: "Pick a colour",
    options: [
      { type: OptionType.String, name: "name", description: "Colour name", required: true, autocomplete: true },
    ],
  });

  g.command(
    "Wave at",
    (ctx) => (ctx.data.kind === "command" && ctx.data.targetId ? `Waving at <@${ctx.data.targetId}>` : "Waving"),
    { commandType: CommandType.User },
  );

  g.autocomplete("colour", (ctx) => {
    const focused = ctx.data.kind === "autocomplete" ? ctx.data.focused?.value : undefined;
    const typed = String(focused ?? "").toLowerCase();
    return [COLOURS.filter((c) => c.startsWith(typed)).map((c) => choice(c))];
  });

  g.command("feedback", () =>
    modal({
      customId: "feedback_form",
      title: "Feedback",
      components: [new TextInput({ customId: "body", label: "What should we change?", style: 2 })],
    }),
  );

  g.modal("feedback_form", (ctx) =>
    ctx.data.kind === "modal" ? `Thanks, we got: ${ctx.data.fields.body ?? ""}` : "Thanks",
  );
});
