import type { Fragment, Message, MessageRole } from "./types";

type Draft = {
  role: MessageRole;
  contentSoFar: string;
  thinkingSoFar?: string;
  complete: boolean;
  sequenceIndex: number;
};

export type ApplyOutcome =
  | { status: "applied"; message: Message; completed: boolean }
  | { status: "discarded"; reason: "stale"; lastApplied: number };

function freeze(draft: Draft): Message {
  const message: Message = {
    role: draft.role,
    contentSoFar: draft.contentSoFar,
    complete: draft.complete,
    sequenceIndex: draft.sequenceIndex,
    ...(draft.thinkingSoFar !== undefined ? { thinkingSoFar: draft.thinkingSoFar } : {}),
  };
  return Object.freeze(message);
}

/**
 * Builds the message list of one session from its ordered fragment stream.
 * Single writer: only the owning registry calls into it.
 *
 * Fragments must arrive with increasing sequence numbers. Anything at or
 * below the last applied number is dropped; nothing is reordered.
 */
export class StreamAssembler {
  private readonly drafts: Draft[] = [];
  private open: Draft | null = null;
  private lastApplied: number | null = null;

  constructor(readonly sessionId: string) {}

  apply(fragment: Fragment): ApplyOutcome {
    const seq = fragment.sequenceIndex;
    if (this.lastApplied !== null && seq <= this.lastApplied) {
      console.warn(
        `[stream] ${this.sessionId}: discarding fragment seq=${seq} (last applied ${this.lastApplied})`
      );
      return { status: "discarded", reason: "stale", lastApplied: this.lastApplied };
    }
    if (this.lastApplied !== null && seq > this.lastApplied + 1) {
      console.warn(
        `[stream] ${this.sessionId}: sequence gap, expected ${this.lastApplied + 1} got ${seq}`
      );
    }
    this.lastApplied = seq;

    const draft = this.open ?? this.openAssistant();
    if (fragment.kind === "end") {
      draft.complete = true;
      this.open = null;
      return { status: "applied", message: freeze(draft), completed: true };
    }

    if (fragment.kind === "thinking") {
      draft.thinkingSoFar = (draft.thinkingSoFar ?? "") + fragment.delta;
    } else {
      draft.contentSoFar += fragment.delta;
    }
    return { status: "applied", message: freeze(draft), completed: false };
  }

  /**
   * Records a user turn. An assistant reply still streaming stays open and
   * keeps receiving its fragments.
   */
  appendUser(text: string): Message {
    const draft: Draft = {
      role: "user",
      contentSoFar: text,
      complete: true,
      sequenceIndex: this.drafts.length,
    };
    this.drafts.push(draft);
    return freeze(draft);
  }

  messages(): Message[] {
    return this.drafts.map(freeze);
  }

  openMessage(): Message | null {
    return this.open ? freeze(this.open) : null;
  }

  lastAppliedSequence(): number | null {
    return this.lastApplied;
  }

  private openAssistant(): Draft {
    const draft: Draft = {
      role: "assistant",
      contentSoFar: "",
      complete: false,
      sequenceIndex: this.drafts.length,
    };
    this.drafts.push(draft);
    this.open = draft;
    return draft;
  }
}
