import { PredictedTag } from "../../data/predictions.js";
import type { TagAdapter } from "./tag.js";
import { nonEmpty } from "./fields.js";

/**
 * Predicted tags are stored inline as `[tag id, score]` pairs.
 */
export function predictedTagsToRecord(
  tags: TagAdapter,
  predicted: PredictedTag[]
): [number, number][] | undefined {
  return nonEmpty(predicted.map((item): [number, number] => [tags.toRecord(item.tag).id, item.score]));
}

export function predictedTagsFromRecord(
  tags: TagAdapter,
  pairs: [number, number][] | undefined,
  referencedBy: string
): PredictedTag[] {
  return (pairs ?? []).map(
    ([id, score]) => new PredictedTag({ tag: tags.resolve(id, referencedBy), score })
  );
}
