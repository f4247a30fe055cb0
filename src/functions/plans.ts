import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from "aws-lambda";
import { z } from "zod";
import type { PlanStore } from "../lib/dynamo";
import type { Logger } from "../lib/logger";
import { getRuntime } from "../lib/runtime";
import type { ArtifactStatus, DayPlan, PlanRecord } from "../lib/schemas";

export const PENDING_WARNING = "Visual generation pending. Your plan is ready below.";
const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 50;

const JwtContextSchema = z.object({
  authorizer: z.object({
    jwt: z.object({
      claims: z.object({ sub: z.string().min(1) }),
    }),
  }),
});

const LimitSchema = z.coerce.number().int().min(1);

export interface PlanView {
  recordId: string;
  userId: string;
  createdAt: string;
  emotion: string;
  sentimentScore: number;
  weeklyPlan: DayPlan[];
  artifact: {
    status: ArtifactStatus;
    url: string | null;
    warning: string | null;
  };
  isFallback: boolean;
}

export interface PlansResponse {
  userId: string;
  planCount: number;
  plans: PlanView[];
  notice?: string;
}

/**
 * A record without its artifact is still a complete answer: it is returned
 * with a warning, never as an error.
 */
export function formatPlan(plan: PlanRecord): PlanView {
  const status = plan.artifactStatus ?? "pending";
  const url = plan.artifactUrl ?? null;
  return {
    recordId: plan.recordId,
    userId: plan.userId,
    createdAt: plan.createdAt,
    emotion: plan.emotion,
    sentimentScore: plan.sentimentScore,
    weeklyPlan: plan.weeklyPlan ?? [],
    artifact: {
      status,
      url,
      warning: status === "pending" || !url ? PENDING_WARNING : null,
    },
    isFallback: plan.isFallback ?? false,
  };
}

export function formatPlans(userId: string, plans: PlanRecord[]): PlansResponse {
  const views = plans.map(formatPlan);
  const response: PlansResponse = { userId, planCount: views.length, plans: views };
  const pending = views.filter((view) => view.artifact.warning !== null).length;
  if (pending > 0) {
    response.notice = `${pending} plan(s) have visual generation pending`;
  }
  return response;
}

function respond(statusCode: number, body: unknown): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Access-Control-Allow-Methods": "GET, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type, Authorization",
    },
    body: JSON.stringify(body),
  };
}

function resolveUserId(event: APIGatewayProxyEventV2): string | undefined {
  const fromPath = event.pathParameters?.userId?.trim();
  if (fromPath) return fromPath;
  const context = JwtContextSchema.safeParse(event.requestContext);
  return context.success ? context.data.authorizer.jwt.claims.sub : undefined;
}

export interface PlansHandlerDeps {
  plans: PlanStore;
  logger: Logger;
}

export function createPlansHandler(deps: PlansHandlerDeps) {
  return async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
    const userId = resolveUserId(event);
    if (!userId) {
      return respond(400, { error: "Bad Request", message: "userId is required" });
    }

    const rawLimit = event.queryStringParameters?.limit;
    let limit = DEFAULT_LIMIT;
    if (rawLimit !== undefined) {
      const parsed = LimitSchema.safeParse(rawLimit);
      if (!parsed.success) {
        return respond(400, { error: "Bad Request", message: "limit must be a positive integer" });
      }
      limit = Math.min(parsed.data, MAX_LIMIT);
    }

    try {
      const plans = await deps.plans.listPlans(userId, limit);
      if (plans.length === 0) {
        return respond(404, { error: "Not Found", message: `No plans found for user: ${userId}` });
      }

      deps.logger.info(`Returning ${plans.length} plans`, { userId });
      return respond(200, formatPlans(userId, plans));
    } catch (error) {
      deps.logger.error("Failed to retrieve plans", { userId, error });
      return respond(500, { error: "Internal Server Error", message: "Failed to retrieve plans" });
    }
  };
}

let defaultHandler: ReturnType<typeof createPlansHandler> | undefined;

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (!defaultHandler) {
    const runtime = getRuntime();
    defaultHandler = createPlansHandler({ plans: runtime.plans, logger: runtime.logger.child("plans-api") });
  }
  return defaultHandler(event);
}
