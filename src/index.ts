export { createInteractionApp, InteractionApp } from "./app/createInteractionApp";
export type { InteractionAppOptions } from "./app/createInteractionApp";
export { defineHandlerGroup } from "./app/handlerGroup";
export type { GroupHook, HandlerGroup, HandlerGroupOptions } from "./app/handlerGroup";
export { HandlerRegistrar } from "./app/registrar";
export type {
  CommandHandlerOptions,
  ComponentHandlerOptions,
  HandlerOptions,
  ModalHandlerOptions,
} from "./app/registrar";

export { defineCommand, toCommandPayload, validateCommandDefinition } from "./commands/definitions";
export { CommandSyncError, InvalidCommandDefinitionError } from "./commands/errors";
export { createCommandSyncClient } from "./commands/syncClient";
export type { CommandSyncClient } from "./commands/syncClient";
export { OptionType } from "./commands/types";
export type { CommandDefinition, CommandOptionDefinition, CommandPayload, OptionTypeCode } from "./commands/types";

export { InteractionDispatcher } from "./dispatch/engine";
export type { DispatchResult, InteractionState } from "./dispatch/engine";
export { BackgroundSupervisor } from "./dispatch/supervisor";
export { MAX_DEFER_TIMEOUT_MS } from "./dispatch/deferPolicy";
export type { DeferPolicy } from "./dispatch/deferPolicy";
export { AlreadyRespondedError, EmptyResponseError } from "./dispatch/errors";

export { createFollowupClient } from "./followup/client";
export { FollowupHttpError } from "./followup/errors";
export type { FollowupClient } from "./followup/types";

export { loadHandlerConfig } from "./handlerConfig/loadHandlerConfig";
export { parseHandlerConfigYaml } from "./handlerConfig/parseHandlerConfig";
export type { HandlerConfig } from "./handlerConfig/parseHandlerConfig";

export { createInteractionsRouter } from "./http/createInteractionsRouter";

export { InteractionContext } from "./interactions/context";
export * from "./interactions/types";

export { loadConfig } from "./lib/config";
export type { AppConfig } from "./lib/config";
export { createRequestContext, createSpineLogger } from "./lib/logging";
export type { Logger, RequestContext } from "./lib/logging";

export { formatCustomId, InvalidTemplateError, matchCustomId, parseCustomIdTemplate } from "./matching/customIdTemplate";
export type { CustomIdTemplate, ParamType, TemplateValue } from "./matching/customIdTemplate";

export { HandlerRegistry } from "./registry/registry";
export { DuplicateRegistrationError, GroupAlreadyLoadedError, InvalidRegistrationError } from "./registry/errors";
export type { Registration, RegistrationInit, Resolution } from "./registry/types";

export * from "./response";

export { normalizeInteraction } from "./webhook/normalizeInteraction";
export { WebhookAuthError, WebhookParseError } from "./webhook/errors";
