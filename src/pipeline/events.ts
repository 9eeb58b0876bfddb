import type { ReassemblyStatus } from "../transcription/types.js";

export type ReassemblyState =
  | "planned"
  | "dispatching"
  | "folding"
  | "complete"
  | "partial"
  | "cancelled";

export type ReassemblyEvent =
  | {
      type: "reassembly:state";
      state: ReassemblyState;
      timestamp: string;
    }
  | {
      type: "reassembly:start";
      audioLengthMs: number;
      totalChunks: number;
      concurrency: number;
      timestamp: string;
    }
  | {
      type: "chunk:start";
      chunkIndex: number;
      attempt: number;
      timestamp: string;
    }
  | {
      type: "chunk:retry";
      chunkIndex: number;
      retry: number;
      delayMs: number;
      error: string;
      timestamp: string;
    }
  | {
      type: "chunk:done";
      chunkIndex: number;
      words: number;
      segments: number;
      timestamp: string;
    }
  | {
      type: "chunk:gap";
      chunkIndex: number;
      logicalStartMs: number;
      logicalEndMs: number;
      error: string;
      timestamp: string;
    }
  | {
      type: "chunk:folded";
      chunkIndex: number;
      keptWords: number;
      droppedWords: number;
      keptSegments: number;
      droppedSegments: number;
      textDropped: boolean;
      seamOverlapChars: number;
      inconsistencies: number;
      timestamp: string;
    }
  | {
      type: "reassembly:done";
      status: ReassemblyStatus;
      totalChunks: number;
      gaps: number;
      timestamp: string;
    }
  | {
      type: "reassembly:cancelled";
      folded: number;
      totalChunks: number;
      timestamp: string;
    };

export interface ReassemblyEventEmitter {
  emit(event: ReassemblyEvent): void;
}
