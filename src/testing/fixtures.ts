import { InteractionContext } from "../interactions/context";
import { CommandType, ComponentType } from "../interactions/types";
import type { ComponentTypeCode, InteractionData, InteractionEvent } from "../interactions/types";
import { createSpineLogger } from "../lib/logging";
import type { Logger } from "../lib/logging";

export const TEST_CREDENTIALS = { applicationId: "app-1", token: "test-token" };

export function buildEvent(data: InteractionData, overrides: Partial<InteractionEvent> = {}): InteractionEvent {
  return {
    id: "interaction-1",
    credentials: TEST_CREDENTIALS,
    data,
    guildId: "guild-1",
    channelId: "channel-1",
    user: { id: "user-1", username: "tester" },
    locale: "en-US",
    guildLocale: null,
    message: null,
    member: null,
    ...overrides,
  };
}

export function commandContext(name: string, commandType: 1 | 2 | 3 = CommandType.ChatInput): InteractionContext {
  return new InteractionContext(
    buildEvent({ kind: "command", id: "cmd-1", name, commandType, options: [] }),
  );
}

export function componentContext(
  customId: string,
  componentType: ComponentTypeCode = ComponentType.Button,
): InteractionContext {
  return new InteractionContext(buildEvent({ kind: "component", customId, componentType, values: [] }));
}

export function autocompleteContext(name: string): InteractionContext {
  return new InteractionContext(
    buildEvent({
      kind: "autocomplete",
      id: "cmd-1",
      name,
      commandType: CommandType.ChatInput,
      options: [],
      focused: null,
    }),
  );
}

export function modalContext(customId: string, fields: Record<string, string> = {}): InteractionContext {
  return new InteractionContext(buildEvent({ kind: "modal", customId, fields }));
}

/** A logger that records every rendered entry instead of printing it. */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: createSpineLogger({ app: "interactions", domain: "", sink: (l) => lines.push(l) }), lines };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
