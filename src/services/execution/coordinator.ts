/**
 * Execution Coordinator
 *
 * State machine for the single job the relay runs at a time. Engine events
 * drive every state change; HTTP callers only submit, wait and interrupt.
 *
 *   idle ──submit──▶ queued ──execution_start──▶ running ──success──▶ completed
 *                      │                           │
 *                      └──── error / disconnect ───┴──▶ errored
 *                      └──── interrupted ──────────┴──▶ interrupted
 *
 * Terminal states only ever leave through another submit.
 */

import { STATUS_MESSAGES } from '../../constants.ts';
import { EventEmitter } from '../../core/event-emitter.ts';
import { debugLog, verboseLog } from '../../debug.ts';
import {
  EngineEventTypes,
  createTextEvent,
  type RelayEvent,
  type TextEvent,
} from '../../protocol/events.ts';
import { pickOutputImage } from '../upstream/outputs.ts';
import type { EventBroadcaster, ExecutionEventSink, OutputImage } from '../upstream/types.ts';
import type { GraphSnapshot } from '../workflow/types.ts';
import { ExecutionError } from './errors.ts';
import {
  IN_FLIGHT_STATES,
  type ExecutionBackend,
  type ExecutionEvents,
  type ExecutionOptions,
  type ExecutionProgress,
  type ExecutionResult,
  type ExecutionState,
  type ExecutionStatus,
} from './types.ts';

type TerminalState = Extract<ExecutionState, 'completed' | 'errored' | 'interrupted'>;

const TIMED_OUT = Symbol('timed out');

/**
 * What a finished job left behind, captured at the moment it finished.
 */
interface JobOutcome {
  state: TerminalState;
  image: OutputImage | null;
  error: string | null;
}

const ALLOWED_TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  idle: ['queued'],
  queued: ['running', 'completed', 'errored', 'interrupted'],
  running: ['running', 'completed', 'errored', 'interrupted'],
  completed: ['queued'],
  errored: ['queued'],
  interrupted: ['queued'],
};

function isTerminal(state: ExecutionState): state is TerminalState {
  return state === 'completed' || state === 'errored' || state === 'interrupted';
}

function isInFlight(state: ExecutionState): boolean {
  return IN_FLIGHT_STATES.includes(state);
}

export class ExecutionCoordinator
  extends EventEmitter<ExecutionEvents>
  implements ExecutionEventSink
{
  private state: ExecutionState = 'idle';
  private promptId: string | null = null;
  private progress: ExecutionProgress | null = null;
  private lastError: string | null = null;
  private outputImage: OutputImage | null = null;
  private lastUpdated = new Date().toISOString();
  private jobCounter = 0;

  /** Settles the current job; replaced on every submit */
  private settle: ((outcome: JobOutcome) => void) | null = null;
  private interruptTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly backend: ExecutionBackend,
    private readonly broadcaster: EventBroadcaster,
    private readonly options: ExecutionOptions
  ) {
    super();
  }

  getState(): ExecutionState {
    return this.state;
  }

  /** A job is queued or running */
  isBusy(): boolean {
    return isInFlight(this.state);
  }

  getStatus(): ExecutionStatus {
    return {
      state: this.state,
      promptId: this.promptId,
      progress: this.progress ? { ...this.progress } : null,
      error: this.lastError,
      lastUpdated: this.lastUpdated,
    };
  }

  /**
   * Submit a snapshot and block until the engine reports a terminal state.
   *
   * @throws ExecutionError ALREADY_RUNNING before touching anything if a job
   *   is in flight
   * @throws UpstreamError if submission fails; the job ends `errored`
   * @throws ExecutionError EXECUTION_FAILED, EXECUTION_INTERRUPTED or
   *   EXECUTION_TIMEOUT for the engine's outcome
   */
  async submitAndWait(snapshot: GraphSnapshot, timeoutMs: number): Promise<ExecutionResult> {
    if (isInFlight(this.state)) {
      throw ExecutionError.alreadyRunning(this.state);
    }

    const outcome = new Promise<JobOutcome>((resolve) => {
      this.settle = resolve;
    });

    const deadline = Date.now() + timeoutMs;
    const job = ++this.jobCounter;
    this.promptId = null;
    this.progress = null;
    this.lastError = null;
    this.outputImage = null;
    this.transition('queued');

    let promptId: string;
    try {
      promptId = await this.backend.submit(snapshot);
    } catch (error) {
      if (job === this.jobCounter) {
        this.lastError = error instanceof Error ? error.message : String(error);
        this.transition('errored');
      }
      throw error;
    }
    // The job may have ended during submission and been replaced
    if (job === this.jobCounter) {
      this.promptId = promptId;
    }

    const finished = await withDeadline(outcome, deadline);
    if (finished === TIMED_OUT) {
      verboseLog(`Workflow ${promptId} did not finish within ${timeoutMs}ms`, 'warn');
      throw ExecutionError.timeout(timeoutMs, promptId);
    }

    switch (finished.state) {
      case 'completed':
        return this.buildResult(promptId, finished.image, deadline, timeoutMs);
      case 'errored':
        throw ExecutionError.failed(finished.error ?? 'unknown error', promptId);
      case 'interrupted':
        throw ExecutionError.interrupted(promptId);
    }
  }

  /**
   * Interrupt the engine and clear its queue. The state changes when the
   * engine confirms, or after the grace period if the engine accepted the
   * interrupt but never confirms it.
   */
  async requestInterrupt(): Promise<void> {
    try {
      await this.backend.interrupt();
      this.armInterruptFallback();
      await this.backend.clearQueue();
    } catch (error) {
      verboseLog(`Interrupt failed: ${error instanceof Error ? error.message : error}`, 'error');
      throw error;
    }
  }

  handleEvent(event: RelayEvent): void {
    // Binary frames are previews only
    if (event.kind !== 'text') return;

    if (!isInFlight(this.state)) {
      debugLog(`[ExecutionCoordinator] Ignoring '${event.type}' in state ${this.state}`);
      return;
    }

    const eventPromptId = event.data.prompt_id;
    if (typeof eventPromptId === 'string' && this.promptId && eventPromptId !== this.promptId) {
      debugLog(`[ExecutionCoordinator] Ignoring '${event.type}' for prompt ${eventPromptId}`);
      return;
    }

    switch (event.type) {
      case EngineEventTypes.EXECUTION_START:
        this.transition('running');
        break;

      case EngineEventTypes.PROGRESS:
        this.recordProgress(event);
        break;

      case EngineEventTypes.EXECUTING:
      case EngineEventTypes.EXECUTION_CACHED:
        if (this.state === 'running') this.transition('running');
        break;

      case EngineEventTypes.EXECUTED:
        this.recordExecuted(event);
        break;

      case EngineEventTypes.EXECUTION_SUCCESS:
      case EngineEventTypes.EXECUTION_COMPLETE:
        this.transition('completed');
        break;

      case EngineEventTypes.EXECUTION_ERROR: {
        const message = event.data.exception_message;
        this.lastError = typeof message === 'string' && message ? message : 'Unknown error';
        verboseLog(`Execution error: ${this.lastError}`, 'error');
        this.transition('errored');
        break;
      }

      case EngineEventTypes.EXECUTION_INTERRUPTED:
        this.transition('interrupted');
        break;
    }
  }

  handleDisconnect(reason: string): void {
    if (!isInFlight(this.state)) return;
    this.lastError = reason;
    this.transition('errored');
  }

  /**
   * Drop timers; a blocked caller is released as interrupted.
   */
  dispose(): void {
    this.clearInterruptTimer();
    if (isInFlight(this.state)) {
      this.lastError = 'relay shutting down';
      this.transition('interrupted');
    }
    this.removeAllListeners();
  }

  private transition(to: ExecutionState): void {
    const from = this.state;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      debugLog(`[ExecutionCoordinator] Ignoring transition ${from} -> ${to}`);
      return;
    }

    this.state = to;
    this.lastUpdated = new Date().toISOString();

    if (from !== to) {
      debugLog(`[ExecutionCoordinator] ${from} -> ${to} (prompt ${this.promptId ?? 'pending'})`);
      this.emit('stateChange', { from, to, promptId: this.promptId });
    }

    if (isTerminal(to)) {
      this.clearInterruptTimer();
      const settle = this.settle;
      this.settle = null;
      settle?.({ state: to, image: this.outputImage, error: this.lastError });
    }
  }

  private recordProgress(event: TextEvent): void {
    const { value, max } = event.data;
    if (typeof value !== 'number' || typeof max !== 'number') return;

    this.progress = { value, max };
    if (this.state === 'running') this.transition('running');

    const percent = max > 0 ? Math.floor((value / max) * 100) : 0;
    debugLog(`[ExecutionCoordinator] Progress: ${value}/${max} (${percent}%)`);
  }

  private recordExecuted(event: TextEvent): void {
    if (this.state === 'running') this.transition('running');

    const node = event.data.node;
    if (node === undefined || node === null || String(node) !== this.options.saveImageNodeId) {
      return;
    }

    const image = pickOutputImage(event.data.output);
    if (image) {
      this.outputImage = image;
      verboseLog(`Save image node (${this.options.saveImageNodeId}) completed: ${image.filename}`);
    }
  }

  /**
   * The history lookup shares the caller's deadline with the wait itself.
   */
  private async buildResult(
    promptId: string,
    captured: OutputImage | null,
    deadline: number,
    timeoutMs: number
  ): Promise<ExecutionResult> {
    let image = captured;
    if (!image) {
      const found = await withDeadline(
        this.backend.fetchOutputImage(promptId, this.options.saveImageNodeId),
        deadline
      );
      if (found === TIMED_OUT) {
        verboseLog(`No image for ${promptId} within ${timeoutMs}ms`, 'warn');
        throw ExecutionError.timeout(timeoutMs, promptId);
      }
      image = found;
    }
    if (!image) {
      throw ExecutionError.failed('completed but no image found', promptId);
    }

    const result: ExecutionResult = {
      STATUS: STATUS_MESSAGES.COMPLETED,
      image_filename: image.filename,
      image_url: this.backend.viewUrl(image),
    };

    this.broadcaster.broadcast(createTextEvent('image_generated', { ...result, prompt_id: promptId }));
    verboseLog(`Workflow completed: ${result.image_url}`);
    return result;
  }

  private armInterruptFallback(): void {
    const { interruptGraceMs } = this.options;
    if (interruptGraceMs <= 0 || !isInFlight(this.state)) return;

    this.clearInterruptTimer();
    this.interruptTimer = setTimeout(() => {
      this.interruptTimer = null;
      if (isInFlight(this.state)) {
        verboseLog(`Interrupt not acknowledged within ${interruptGraceMs}ms, marking interrupted`, 'warn');
        this.transition('interrupted');
      }
    }, interruptGraceMs);
  }

  private clearInterruptTimer(): void {
    if (this.interruptTimer) {
      clearTimeout(this.interruptTimer);
      this.interruptTimer = null;
    }
  }
}

async function withDeadline<T>(work: Promise<T>, deadline: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, deadline - Date.now()));
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
