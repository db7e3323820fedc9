/**
 * Novelty evaluation endpoint.
 *
 * POST /api/novelty - Score a submission against GitHub and the web.
 *
 * Evaluations make many sequential provider calls and can take minutes;
 * the request is held open until the report is complete.
 */

import type { NoveltyService, NoveltySubmission } from "@pitchcheck/pipeline";
import { type Logger, toNoveltyReportJson } from "@pitchcheck/shared";
import type { FastifyInstance } from "fastify";
import { recordNoveltyEvaluation } from "../metrics.js";

export interface NoveltyRoutesOptions {
  service: NoveltyService;
  log: Logger;
}

type ParsedBody = { ok: true; submission: NoveltySubmission } | { ok: false; message: string };

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

const INVALID = Symbol("invalid");

/** Absent (undefined, null or blank) reads as null; a non-string value is invalid. */
function readTextField(value: unknown): string | null | typeof INVALID {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") return INVALID;
  return nonEmptyString(value);
}

function parseNoveltyBody(body: unknown): ParsedBody {
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return { ok: false, message: "Request body must be a JSON object" };
  }

  const repoUrl = nonEmptyString("repoUrl" in body ? body.repoUrl : undefined);
  if (!repoUrl) {
    return { ok: false, message: "repoUrl is required and must be a non-empty string" };
  }

  const presentationSummary = readTextField(
    "presentationSummary" in body ? body.presentationSummary : undefined,
  );
  if (presentationSummary === INVALID) {
    return { ok: false, message: "presentationSummary must be a string" };
  }
  const transcript = readTextField("transcript" in body ? body.transcript : undefined);
  if (transcript === INVALID) {
    return { ok: false, message: "transcript must be a string" };
  }

  if (presentationSummary && transcript) {
    return { ok: false, message: "Provide either presentationSummary or transcript, not both" };
  }
  if (presentationSummary) {
    return { ok: true, submission: { repoUrl, presentationSummary } };
  }
  if (transcript) {
    return { ok: true, submission: { repoUrl, transcript } };
  }
  return { ok: false, message: "One of presentationSummary or transcript is required" };
}

export async function noveltyRoutes(fastify: FastifyInstance, opts: NoveltyRoutesOptions): Promise<void> {
  fastify.post<{ Body: unknown }>("/novelty", async (request, reply) => {
    const parsed = parseNoveltyBody(request.body);
    if (!parsed.ok) {
      return reply.code(400).send({
        ok: false,
        error: {
          code: "INVALID_BODY",
          message: parsed.message,
        },
      });
    }

    const startedAt = process.hrtime.bigint();
    const durationSec = () => Number(process.hrtime.bigint() - startedAt) / 1e9;

    try {
      const report = await opts.service.evaluate(parsed.submission, {
        log: opts.log.child({ component: "novelty", requestId: request.id }),
      });
      recordNoveltyEvaluation("ok", durationSec());
      return { ok: true, report: toNoveltyReportJson(report) };
    } catch (err) {
      recordNoveltyEvaluation("error", durationSec());
      throw err;
    }
  });
}
