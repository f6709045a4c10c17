import { describeRegistryError, type TrialTable } from "@trialscope/registry";
import { LoadError } from "@trialscope/ui";
import { DEFAULT_CONDITION, loadTrials } from "@/lib/trials";
import { LandscapeClient } from "./LandscapeClient";

export const dynamic = "force-dynamic";
export const maxDuration = 60;

type SearchParams = Promise<Record<string, string | string[] | undefined>>;

function conditionFrom(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.trim() || DEFAULT_CONDITION;
}

export default async function Home({ searchParams }: { searchParams: SearchParams }) {
  const condition = conditionFrom((await searchParams).condition);

  let trials: TrialTable | null = null;
  let error: string | null = null;
  try {
    trials = await loadTrials(condition);
  } catch (err) {
    console.error("landscape load error:", err);
    error = describeRegistryError(err);
  }

  return (
    <main className="min-h-screen bg-gray-50">
      <div className="mx-auto max-w-6xl px-4 py-8">
        <h1 className="text-3xl font-bold text-gray-900">Rare Disease Clinical Trial Landscape</h1>
        <p className="mt-2 text-gray-600">
          Registered studies matching “{condition}” on ClinicalTrials.gov.
        </p>
        {trials ? (
          <LandscapeClient key={condition} condition={condition} trials={trials} />
        ) : (
          <div className="mt-6">
            <LoadError condition={condition} message={error ?? "Unknown error."} />
          </div>
        )}
      </div>
    </main>
  );
}
