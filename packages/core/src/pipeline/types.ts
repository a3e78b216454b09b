import type { ConversationTurn, Settings } from '../domain/schemas';
import type { CompletionClient } from '../clients/types';
import type { FrozenSessionContext } from '../session/context';

export type DeliveryKind = 'alwaysChat' | 'routeByOutput';

export interface PipelineInput {
  context: FrozenSessionContext;
  settings: Settings;
  transcription: string;
  /** Language tag reported by the transcription service. */
  detectedLanguage?: string;
  signal?: AbortSignal;
}

export interface PipelineResult {
  text: string;
  delivery: DeliveryKind;
  /** The user/assistant pair this run adds to the conversation when it is shown in chat. */
  turn: readonly [ConversationTurn, ConversationTurn];
  stepsApplied: string[];
}

export interface PipelineDependencies {
  completion: CompletionClient;
}

export type PipelineDispatcher = (input: PipelineInput) => Promise<PipelineResult>;
