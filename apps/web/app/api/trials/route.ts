import { NextRequest } from "next/server";
import {
  describeRegistryError,
  RegistryRequestError,
  RegistryResponseError,
  TransportError,
} from "@trialscope/registry";
import { loadTrials } from "@/lib/trials";

export const dynamic = "force-dynamic";
export const maxDuration = 60;

const MAX_STUDIES_LIMIT = 10_000;

/**
 * GET /api/trials?condition=ALS&max=1000
 * Returns the normalized trial table for a condition. `max` defaults to CT_MAX_STUDIES.
 */
export async function GET(request: NextRequest) {
  const condition = (request.nextUrl.searchParams.get("condition") ?? "").trim();
  if (!condition) {
    return Response.json({ error: "Missing condition" }, { status: 400 });
  }

  const maxParam = request.nextUrl.searchParams.get("max");
  let max: number | undefined;
  if (maxParam !== null) {
    if (!/^\d+$/.test(maxParam) || Number(maxParam) > MAX_STUDIES_LIMIT) {
      return Response.json(
        { error: `max must be an integer between 0 and ${MAX_STUDIES_LIMIT}` },
        { status: 400 }
      );
    }
    max = Number(maxParam);
  }

  try {
    const trials = await loadTrials(condition, max);
    return Response.json({ condition, count: trials.length, trials });
  } catch (err) {
    console.error("trials error:", err);
    if (err instanceof RegistryRequestError) {
      return Response.json({ error: describeRegistryError(err), status: err.status }, { status: 502 });
    }
    if (err instanceof RegistryResponseError) {
      return Response.json({ error: describeRegistryError(err) }, { status: 502 });
    }
    if (err instanceof TransportError) {
      return Response.json({ error: describeRegistryError(err) }, { status: 504 });
    }
    return Response.json({ error: "Failed to load trials" }, { status: 500 });
  }
}
