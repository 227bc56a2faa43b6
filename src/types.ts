// ── Inputs ────────────────────────────────────────────────────────────────────

export interface DialogueClip {
  path: string;
  /** 1-based playback position within the scene */
  order: number;
  character?: string;
  text?: string;
}

export interface Scene {
  /** 1-based, matches the scene's position in the video list */
  sceneId: number;
  videoPath: string | null;
  dialogue: DialogueClip[];
}

// ── Probing ───────────────────────────────────────────────────────────────────

export type ProbeResult =
  | { ok: true; seconds: number }
  | { ok: false; seconds: number; reason: string };

// ── Timeline ──────────────────────────────────────────────────────────────────

export interface ScheduledClip extends DialogueClip {
  /** Seconds from scene start */
  startOffset: number;
  /** Duration used to advance the cursor past this clip */
  duration: number;
  durationSource: 'probed' | 'defaulted';
}

// ── Composition ───────────────────────────────────────────────────────────────

export type ComposeMode = 'mixed' | 'video_only' | 'silent_fallback';

export type SceneOutcome =
  | {
      status: 'composed';
      sceneId: number;
      outputPath: string;
      mode: ComposeMode;
      clipCount: number;
      /** Encoder error excerpt when the mix failed and passthrough was used */
      fallbackReason?: string;
      /** Seconds of scheduled dialogue past the end of the video */
      dialogueOverrun?: number;
    }
  | {
      status: 'dropped';
      sceneId: number;
      reason: 'missing_video';
    };

export type ComposedScene = Extract<SceneOutcome, { status: 'composed' }>;

// ── Merge ─────────────────────────────────────────────────────────────────────

export type MergeOutcome =
  | {
      ok: true;
      outputPath: string;
      sceneCount: number;
      duration: ProbeResult;
      /** Whether the reel lands in the 30–45 s target band (advisory) */
      withinTarget: boolean;
    }
  | {
      ok: false;
      reason: 'no_valid_scenes' | 'encode_failed';
      detail?: string;
    };

export interface PipelineSummary {
  scenes: SceneOutcome[];
  merge: MergeOutcome;
  /** Path of the sidecar file, present only when the merge succeeded */
  sidecarPath?: string;
}
