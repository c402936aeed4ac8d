/**
 * Adapter: GeminiOracle
 *
 * Implements the PlanOracle and ReviewOracle ports on top of Gemini
 * structured output. Every model answer is validated with zod; any
 * failure (missing key, network, timeout, malformed answer) is logged
 * and turned into the port's sentinel value.
 *
 * Dependencies: @google/generative-ai, zod.
 */

import {
  GoogleGenerativeAI,
  type ResponseSchema,
  SchemaType,
} from "@google/generative-ai";
import { z } from "zod/mini";
import {
  type AuditReport,
  type ChangeExplanation,
  type CommitMessage,
  normalizeRiskLevel,
  type Plan,
  unavailablePlan,
} from "../../domain/entities/plan.ts";
import type { Logger } from "../../domain/ports/logger.ts";
import type {
  FixRequest,
  PlanOracle,
  ReviewOracle,
} from "../../domain/ports/oracle.ts";
import {
  auditPrompt,
  commitPrompt,
  explainPrompt,
  fixPrompt,
  planPrompt,
} from "./prompts.ts";

// ============================================================================
// Model access
// ============================================================================

/**
 * Sends a prompt and returns the raw JSON text of the answer.
 */
export interface JsonGenerator {
  generateJson(prompt: string, schema: ResponseSchema): Promise<string>;
}

export type GeminiOptions = {
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
};

export class GeminiJsonGenerator implements JsonGenerator {
  private readonly client: GoogleGenerativeAI;

  constructor(private readonly options: GeminiOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey);
  }

  async generateJson(prompt: string, schema: ResponseSchema): Promise<string> {
    const model = this.client.getGenerativeModel(
      {
        model: this.options.model,
        generationConfig: {
          responseMimeType: "application/json",
          responseSchema: schema,
          temperature: 0.2,
        },
      },
      { timeout: this.options.timeoutMs },
    );

    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

// ============================================================================
// Schemas
// ============================================================================

const PLAN_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    risk: {
      type: SchemaType.STRING,
      description: "Risk level: LOW, MEDIUM, or HIGH",
    },
    summary: {
      type: SchemaType.STRING,
      description: "Short explanation of what will happen",
    },
    commands: {
      type: SchemaType.ARRAY,
      description: "List of git commands to execute",
      items: { type: SchemaType.STRING },
    },
    missing_info_prompt: {
      type: SchemaType.STRING,
      description: "Question to ask the user when a command needs {INPUT}",
      nullable: true,
    },
  },
  required: ["risk", "summary", "commands"],
};

const COMMIT_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    subject: { type: SchemaType.STRING },
    body: { type: SchemaType.STRING },
  },
  required: ["subject", "body"],
};

const AUDIT_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    passed: { type: SchemaType.BOOLEAN },
    severity: { type: SchemaType.STRING },
    issues: { type: SchemaType.ARRAY, items: { type: SchemaType.STRING } },
  },
  required: ["passed", "severity", "issues"],
};

const EXPLAIN_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    summary: { type: SchemaType.STRING },
    key_changes: {
      type: SchemaType.ARRAY,
      items: { type: SchemaType.STRING },
    },
  },
  required: ["summary", "key_changes"],
};

const PlanResponse = z.object({
  risk: z.string(),
  summary: z.string(),
  commands: z.array(z.string()),
  missing_info_prompt: z.optional(z.nullable(z.string())),
});

const CommitResponse = z.object({
  subject: z.string(),
  body: z.string(),
});

const AuditResponse = z.object({
  passed: z.boolean(),
  severity: z.string(),
  issues: z.array(z.string()),
});

const ExplainResponse = z.object({
  summary: z.string(),
  key_changes: z.array(z.string()),
});

// ============================================================================
// Oracle
// ============================================================================

export class GeminiOracle implements PlanOracle, ReviewOracle {
  constructor(
    private readonly generator: JsonGenerator | null,
    private readonly logger: Logger,
  ) {}

  async getPlan(intent: string): Promise<Plan> {
    return await this.plan(planPrompt(intent), "Failed to generate plan");
  }

  async getFixPlan(request: FixRequest): Promise<Plan> {
    return await this.plan(fixPrompt(request), "Failed to generate fix");
  }

  async generateCommitMessage(diff: string): Promise<CommitMessage | null> {
    const answer = await this.ask(commitPrompt(diff), COMMIT_SCHEMA);
    if (answer === null) return null;
    const parsed = CommitResponse.safeParse(answer);
    if (!parsed.success) {
      this.logger.error("AI Error: malformed commit message response");
      return null;
    }
    return { subject: parsed.data.subject.trim(), body: parsed.data.body.trim() };
  }

  async auditCode(diff: string): Promise<AuditReport | null> {
    const answer = await this.ask(auditPrompt(diff), AUDIT_SCHEMA);
    if (answer === null) return null;
    const parsed = AuditResponse.safeParse(answer);
    if (!parsed.success) {
      this.logger.error("AI Error: malformed audit response");
      return null;
    }
    return parsed.data;
  }

  async explainChanges(diff: string): Promise<ChangeExplanation | null> {
    const answer = await this.ask(explainPrompt(diff), EXPLAIN_SCHEMA);
    if (answer === null) return null;
    const parsed = ExplainResponse.safeParse(answer);
    if (!parsed.success) {
      this.logger.error("AI Error: malformed explanation response");
      return null;
    }
    return {
      summary: parsed.data.summary,
      keyChanges: parsed.data.key_changes,
    };
  }

  private async plan(prompt: string, failure: string): Promise<Plan> {
    if (!this.generator) {
      return unavailablePlan(
        `${failure}: GEMINI_API_KEY not found in environment variables`,
      );
    }

    const answer = await this.ask(prompt, PLAN_SCHEMA);
    if (answer === null) {
      return unavailablePlan(`${failure} via AI`);
    }

    const parsed = PlanResponse.safeParse(answer);
    if (!parsed.success) {
      this.logger.error("AI Error: malformed plan response");
      return unavailablePlan(`${failure}: malformed AI response`);
    }

    const commands = parsed.data.commands
      .map((cmd) => cmd.trim())
      .filter((cmd) => cmd.length > 0);
    const question = parsed.data.missing_info_prompt?.trim();

    return {
      risk: normalizeRiskLevel(parsed.data.risk),
      summary: parsed.data.summary,
      commands,
      ...(question ? { missingInputPrompt: question } : {}),
    };
  }

  /** Raw parsed JSON answer, or null when the model could not be reached. */
  private async ask(
    prompt: string,
    schema: ResponseSchema,
  ): Promise<unknown> {
    if (!this.generator) {
      this.logger.error(
        "Error: GEMINI_API_KEY not found in environment variables.",
      );
      return null;
    }

    try {
      const text = await this.generator.generateJson(prompt, schema);
      return JSON.parse(text);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.error(`AI Error: ${message}`);
      return null;
    }
  }
}
