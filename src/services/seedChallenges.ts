import fs from "fs";
import bundledChallenges from "../../data/challenges.json";
import { CHALLENGE_TYPES, type ChallengeType } from "../models/Challenge";
import type { ChallengeRepository, NewChallenge } from "../store/types";

function isChallengeType(v: unknown): v is ChallengeType {
  return CHALLENGE_TYPES.some((t) => t === v);
}

function parseDefinition(raw: unknown, index: number): NewChallenge {
  if (typeof raw !== "object" || raw === null) throw new Error(`Challenge #${index} is not an object`);

  const name = "name" in raw ? String(raw.name ?? "").trim() : "";
  const description = "description" in raw ? String(raw.description ?? "").trim() : "";
  const type = "type" in raw ? raw.type : undefined;
  const targetValue = "targetValue" in raw ? Number(raw.targetValue) : NaN;
  const rewardPoints = "rewardPoints" in raw ? Number(raw.rewardPoints) : 0;
  const isActive = "isActive" in raw ? raw.isActive !== false : true;

  if (!name) throw new Error(`Challenge #${index} is missing a name`);
  if (!isChallengeType(type)) throw new Error(`Challenge "${name}" has an unknown type`);
  if (!Number.isInteger(targetValue) || targetValue <= 0) {
    throw new Error(`Challenge "${name}" needs a positive integer targetValue`);
  }

  return {
    name,
    description,
    type,
    targetValue,
    rewardPoints: Number.isFinite(rewardPoints) && rewardPoints > 0 ? Math.floor(rewardPoints) : 0,
    isActive,
  };
}

// The bundled catalog is compiled in beside the code; a file path overrides it.
export function loadChallengeDefinitions(file?: string): NewChallenge[] {
  const parsed: unknown = file ? JSON.parse(fs.readFileSync(file, "utf8")) : bundledChallenges;
  if (!Array.isArray(parsed)) throw new Error(`${file ?? "challenges.json"} must contain a JSON array`);
  return parsed.map(parseDefinition);
}

/** Inserts the catalog entries missing by name; returns how many were created. */
export async function seedChallenges(
  challenges: ChallengeRepository,
  definitions: NewChallenge[] = loadChallengeDefinitions()
): Promise<number> {
  let created = 0;
  for (const def of definitions) {
    if (await challenges.createIfMissing(def)) created += 1;
  }
  console.log(`[SEED] Challenges: ${created} created, ${definitions.length - created} already present`);
  return created;
}
