import type { BehaviorAggregator } from "../aggregation/behavior-aggregator";
import { mobOwnerOf } from "../aggregation/profile-key";
import type { EntityClassifier } from "../classifier/entity-classifier";
import { EntityClass } from "../types";

/**
 * Attributes damage dealt by players to the mob that took it, building a
 * damage-taken log used to estimate mob HP.
 */
export class DamageObservationTracker {
  constructor(
    private readonly classifier: EntityClassifier,
    private readonly aggregator: BehaviorAggregator,
  ) {}

  /**
   * Returns true when the target classified as a Mob and the value was recorded.
   */
  observeDamage(targetId: number, magnitude: number): boolean {
    if (!(magnitude > 0)) {
      return false;
    }

    const target = this.classifier.resolve(targetId);
    if (target.entityClass !== EntityClass.Mob) {
      return false;
    }

    this.aggregator.recordDamageTaken(mobOwnerOf(target.registration), magnitude);
    return true;
  }
}
