// ============================================
// Activity Mapping
// Goal kind and scents tied to each activity
// ============================================

import { Activity, Scent, type TargetKind } from '#shared';

/**
 * Scent an ant lays while in this activity.
 * Foraging ants mark the way home, carrying ants mark the way to food.
 */
export function scentOf(activity: Activity): Scent {
  return activity === Activity.FORAGING ? Scent.COLONY : Scent.FOOD;
}

/**
 * Entity kind an ant seeks while in this activity
 */
export function targetKindOf(activity: Activity): TargetKind {
  return activity === Activity.FORAGING ? 'morsel' : 'nest';
}

/**
 * Scent that leads to the activity's goal
 */
export function targetScentOf(activity: Activity): Scent {
  return activity === Activity.FORAGING ? Scent.FOOD : Scent.COLONY;
}

export function switchActivity(activity: Activity): Activity {
  return activity === Activity.FORAGING ? Activity.CARRYING : Activity.FORAGING;
}
