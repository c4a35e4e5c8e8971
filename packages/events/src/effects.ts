/**
 * @ledgerwire/events — Effect record builders.
 *
 * Effect records are produced by the IBC and governance modules and
 * turned into events by eventFromIbc / eventFromProposal.
 */

import type { IbcEffect, ProposalEffect } from "@ledgerwire/types";

/** Event type of every governance proposal-execution effect */
export const PROPOSAL_EVENT_TYPE = "proposal";

export type TallyResult = "passed" | "rejected";

export interface ProposalOutcome {
  readonly proposalId: number | bigint;
  readonly tally: TallyResult;

  /** Whether the proposal carried code to execute */
  readonly hasProposalCode: boolean;

  /** Whether that code executed successfully */
  readonly proposalCodeExitStatus: boolean;
}

function flag(value: boolean): string {
  return value ? "1" : "0";
}

export function createProposalEffect(outcome: ProposalOutcome): ProposalEffect {
  return {
    eventType: PROPOSAL_EVENT_TYPE,
    attributes: Object.freeze({
      tally_result: outcome.tally,
      proposal_id: outcome.proposalId.toString(),
      has_proposal_code: flag(outcome.hasProposalCode),
      proposal_code_exit_status: flag(outcome.proposalCodeExitStatus),
    }),
  };
}

export function createIbcEffect(
  eventType: string,
  attributes: Readonly<Record<string, string>>,
): IbcEffect {
  return { eventType, attributes: Object.freeze({ ...attributes }) };
}
