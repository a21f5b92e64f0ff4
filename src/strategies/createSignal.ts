import { v4 as uuidv4 } from "uuid";
import { ISignal } from "../types/strategy.types";

export type SignalFields = Omit<ISignal, "id">;

/** Signals are frozen at birth and never mutated afterwards. */
export function createSignal(fields: SignalFields): ISignal {
  const quote = fields.quote ? Object.freeze({ ...fields.quote }) : undefined;
  return Object.freeze({ ...fields, quote, id: uuidv4() });
}
