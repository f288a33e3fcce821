/**
 * Agent Loop - bounded ReAct state machine
 *
 * PLANNING → TOOL_DISPATCH → MERGE → PLANNING … → DONE, with FORCED_STOP
 * as the alternate terminal. A session performs at most maxSteps tool
 * dispatch steps; when the cap or the deadline is reached the model gets
 * one last generation without tools and its text is the answer.
 */

import { v4 as uuidv4 } from "uuid";
import { eventBus as defaultEventBus, type EventBus } from "./EventBus.js";
import type { RetrievalTools, ToolResult } from "./RetrievalTools.js";
import type {
  GenerationResponse,
  GenerativeModel,
  ToolCall,
  Turn,
} from "../providers/ProviderAdapter.js";
import type {
  AgentTransitionEvent,
  ToolEvent,
} from "../schemas/events.js";
import { describeError, GenerationError } from "../errors.js";

/**
 * Agent Loop States
 */
export type AgentState =
  | "IDLE" // Session created, no generation yet
  | "PLANNING" // Model deciding: answer or call tools
  | "TOOL_DISPATCH" // Requested tool calls running
  | "MERGE" // Tool results appended to the session
  | "DONE" // Model answered without tools
  | "FORCED_STOP"; // Cap or deadline hit; tool-free final generation

export type AgentTransitionTrigger =
  | "session_start"
  | "tool_calls_requested"
  | "tool_results_ready"
  | "continue"
  | "final_answer"
  | "max_steps"
  | "deadline";

export interface AgentTransition {
  from: AgentState;
  to: AgentState;
  trigger: AgentTransitionTrigger;
  step: number;
  timestamp: number;
}

export interface AgentLoopConfig {
  maxSteps: number;
  /** 0 disables the session deadline */
  deadlineMs: number;
  systemPrompt: string;
  eventBus: EventBus;
}

export interface AgentRunOptions {
  maxSteps?: number;
  signal?: AbortSignal;
  sessionId?: string;
}

export interface AgentRunResult {
  sessionId: string;
  answer: string;
  finalState: "DONE" | "FORCED_STOP";
  /** Tool dispatch steps performed */
  stepCount: number;
  toolCallCount: number;
  generationCount: number;
  turns: Turn[];
  transitions: AgentTransition[];
}

export const AGENT_SYSTEM_PROMPT = `You are a graduate admissions advisor agent for North American computer science programs. You have three search tools over a vector database of university admissions pages.

Workflow:
1. Work out which facts the question needs.
2. Call the search tools strategically to collect them.
3. Judge whether the results are enough; if not, search again.
4. When you have enough, write a clear, accurate final answer.

Search strategy:
- Compound questions (several schools or several aspects): split into single-target searches.
- A named school: prefer search_school.
- FAQ or policy details: search_page_type with page_type "faq".
- Required documents: page_type "checklist". Applicant experiences: page_type "reddit".
- Cross-school comparisons: start with search_general, then narrow down.

Answer rules:
- Rely strictly on retrieved material; never invent numbers, dates or policies.
- If the material is insufficient, say so and suggest checking the official website.
- Cite the source URL at the end of each sentence that states a figure.
- When several schools are compared, organise the answer by dimension (GPA, deadlines, ...) and list each school under it.

Suspicious data:
Results may carry a "Suspicious data" banner with a reason. When you see one, either search again with different wording or another page type to cross-check, or state in the answer that the figure looks wrong and point to the official page.

Plausible ranges: GPA 0.0-4.3 (US scale), TOEFL iBT 0-120, IELTS 0.0-9.0, GRE 130-170 per section and 260-340 total.`;

export const FORCE_ANSWER_INSTRUCTION =
  "Using everything you have retrieved so far, write the final answer now. Do not call any more tools.";

const DEFAULT_CONFIG: AgentLoopConfig = {
  maxSteps: 5,
  deadlineMs: 60000,
  systemPrompt: AGENT_SYSTEM_PROMPT,
  eventBus: defaultEventBus,
};

interface AgentSession {
  id: string;
  turns: Turn[];
  stepCount: number;
  maxSteps: number;
  state: AgentState;
  transitions: AgentTransition[];
  toolCallCount: number;
  generationCount: number;
}

export class AgentLoop {
  private config: AgentLoopConfig;

  constructor(
    private model: GenerativeModel,
    private tools: RetrievalTools,
    config: Partial<AgentLoopConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async run(query: string, options: AgentRunOptions = {}): Promise<AgentRunResult> {
    const session: AgentSession = {
      id: options.sessionId ?? uuidv4(),
      turns: [{ role: "user", content: query }],
      stepCount: 0,
      maxSteps: Math.max(0, options.maxSteps ?? this.config.maxSteps),
      state: "IDLE",
      transitions: [],
      toolCallCount: 0,
      generationCount: 0,
    };

    const deadline = this.createDeadline(options.signal);
    console.log(
      `[Agent] Session ${session.id} started (max ${session.maxSteps} steps)`,
    );

    try {
      this.transition(session, "PLANNING", "session_start");
      let forcedTrigger: "max_steps" | "deadline" = "max_steps";

      while (session.stepCount < session.maxSteps) {
        if (deadline.signal.aborted) {
          forcedTrigger = "deadline";
          break;
        }

        let response: GenerationResponse;
        try {
          response = await this.model.generate({
            system: this.config.systemPrompt,
            turns: session.turns,
            tools: this.tools.definitions,
            signal: deadline.signal,
          });
          session.generationCount++;
        } catch (error) {
          if (deadline.signal.aborted) {
            forcedTrigger = "deadline";
            break;
          }
          throw toGenerationError(error);
        }

        if (response.toolCalls.length === 0) {
          session.turns.push({
            role: "assistant",
            content: response.text,
            toolCalls: [],
          });
          this.transition(session, "DONE", "final_answer");
          return this.finish(session, response.text, "DONE");
        }

        session.turns.push({
          role: "assistant",
          content: response.text,
          toolCalls: response.toolCalls,
        });
        this.transition(session, "TOOL_DISPATCH", "tool_calls_requested");

        const results = await Promise.all(
          response.toolCalls.map((call) =>
            this.dispatch(session, call, deadline.signal),
          ),
        );

        this.transition(session, "MERGE", "tool_results_ready");
        for (const result of results) {
          session.turns.push({
            role: "tool",
            callId: result.callId,
            name: result.name,
            content: result.content,
          });
        }
        session.stepCount++;

        if (session.stepCount < session.maxSteps) {
          this.transition(session, "PLANNING", "continue");
        }
      }

      return await this.forceStop(session, forcedTrigger);
    } finally {
      deadline.dispose();
    }
  }

  private async dispatch(
    session: AgentSession,
    call: ToolCall,
    signal: AbortSignal,
  ): Promise<ToolResult> {
    session.toolCallCount++;
    console.log(`[Agent] → ${call.name}(${JSON.stringify(call.arguments)})`);
    this.emitTool(session.id, "tool.call", {
      tool_name: call.name,
      args: call.arguments,
      call_id: call.id,
    });

    const result = await this.tools.execute(call, signal, session.id);

    this.emitTool(session.id, "tool.result", {
      call_id: call.id,
      result: result.content,
      error: result.isError ? result.content : undefined,
    });
    return result;
  }

  private async forceStop(
    session: AgentSession,
    trigger: "max_steps" | "deadline",
  ): Promise<AgentRunResult> {
    this.transition(session, "FORCED_STOP", trigger);
    session.turns.push({ role: "user", content: FORCE_ANSWER_INSTRUCTION });

    // No tools and no deadline signal: this call must produce the answer.
    let response: GenerationResponse;
    try {
      response = await this.model.generate({
        system: this.config.systemPrompt,
        turns: session.turns,
      });
      session.generationCount++;
    } catch (error) {
      throw toGenerationError(error);
    }

    session.turns.push({ role: "assistant", content: response.text, toolCalls: [] });
    return this.finish(session, response.text, "FORCED_STOP");
  }

  private finish(
    session: AgentSession,
    text: string,
    finalState: "DONE" | "FORCED_STOP",
  ): AgentRunResult {
    console.log(
      `[Agent] Session ${session.id} ${finalState} after ${session.stepCount} steps, ${session.toolCallCount} tool calls`,
    );
    return {
      sessionId: session.id,
      answer: text.trim(),
      finalState,
      stepCount: session.stepCount,
      toolCallCount: session.toolCallCount,
      generationCount: session.generationCount,
      turns: session.turns,
      transitions: session.transitions,
    };
  }

  /**
   * Transition to a new state
   */
  private transition(
    session: AgentSession,
    newState: AgentState,
    trigger: AgentTransitionTrigger,
  ): void {
    const oldState = session.state;
    session.state = newState;

    const transition: AgentTransition = {
      from: oldState,
      to: newState,
      trigger,
      step: session.stepCount,
      timestamp: Date.now(),
    };
    session.transitions.push(transition);
    console.log(`[Agent] ${oldState} -> ${newState} (trigger: ${trigger})`);

    const event: AgentTransitionEvent = {
      event_id: uuidv4(),
      session_id: session.id,
      t_ms: transition.timestamp,
      source: "agent",
      type: "agent.transition",
      payload: {
        from: oldState,
        to: newState,
        trigger,
        step: session.stepCount,
      },
    };
    this.config.eventBus.emit(event);
  }

  private emitTool(
    sessionId: string,
    type: ToolEvent["type"],
    payload: ToolEvent["payload"],
  ): void {
    const event: ToolEvent = {
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "agent",
      type,
      payload,
    };
    this.config.eventBus.emit(event);
  }

  /**
   * Session deadline linked to the caller's signal. dispose() clears the
   * timer and the listener.
   */
  private createDeadline(callerSignal?: AbortSignal): {
    signal: AbortSignal;
    dispose: () => void;
  } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener("abort", onAbort, { once: true });
    }

    const timer =
      this.config.deadlineMs > 0
        ? setTimeout(() => {
            console.warn(`[Agent] Deadline of ${this.config.deadlineMs}ms reached`);
            controller.abort();
          }, this.config.deadlineMs)
        : null;

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer) clearTimeout(timer);
        callerSignal?.removeEventListener("abort", onAbort);
      },
    };
  }
}

function toGenerationError(error: unknown): GenerationError {
  return error instanceof GenerationError
    ? error
    : new GenerationError(`Generation failed: ${describeError(error)}`, error);
}
