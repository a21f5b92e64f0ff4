import { GamblerPattern, IGamblerBehavior, IMicrostructureSnapshot } from "../types/market.types";

const PRESSURE_THRESHOLD = 100;
const CHASE_WMP_PREMIUM = 1.001;
const CHASE_OFI_THRESHOLD = 50;

/**
 * Rule table for crowd behaviour. Pure: depends only on the snapshot.
 */
export function classifyGamblerBehavior(snapshot: IMicrostructureSnapshot): IGamblerBehavior {
  const { spreadStatus, pressure, ofiTrend, wmp, mid, ofi1s } = snapshot;

  const panicSelling =
    spreadStatus === "extreme" && pressure.sellPressure > PRESSURE_THRESHOLD && ofiTrend === "falling";
  const fomoBuying =
    spreadStatus === "wide" && pressure.buyPressure > PRESSURE_THRESHOLD && ofiTrend === "rising";
  const chasingRally = wmp > mid * CHASE_WMP_PREMIUM && ofi1s > CHASE_OFI_THRESHOLD;
  const panicCovering =
    spreadStatus === "extreme" && pressure.buyPressure > PRESSURE_THRESHOLD && ofiTrend === "rising";

  const reasons: GamblerPattern[] = [];
  if (panicSelling) reasons.push("panic_selling");
  if (fomoBuying) reasons.push("fomo_buying");
  if (chasingRally) reasons.push("chasing_rally");
  if (panicCovering) reasons.push("panic_covering");

  return { panicSelling, fomoBuying, chasingRally, panicCovering, reasons };
}
