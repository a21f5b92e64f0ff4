import mongoose, { Schema, Document } from "mongoose";
import { SignalOutcome } from "../types/exchange.types";
import { SignalAction, SignalOrderType, TacticKind } from "../types/strategy.types";

export interface ISignalRecord {
  signalId: string;
  strategy: TacticKind;
  instrument: string;
  action: SignalAction;
  orderType: SignalOrderType;
  price: number;
  size: number;
  confidence: number;
  reason: string;
  outcome: SignalOutcome;
  timestamp: Date;
}

export interface ISignalRecordDoc extends ISignalRecord, Document {}

const SignalRecordSchema: Schema = new Schema({
  signalId: { type: String, required: true, unique: true },
  strategy: {
    type: String,
    enum: ["front_running", "wall_riding", "spread_capturing"],
    required: true,
    index: true,
  },
  instrument: { type: String, required: true, index: true },
  action: { type: String, enum: ["buy", "sell", "market_make"], required: true },
  orderType: { type: String, enum: ["market", "limit", "post_only"], required: true },
  price: { type: Number, required: true },
  size: { type: Number, required: true },
  confidence: { type: Number, required: true },
  reason: { type: String, default: "" },
  outcome: { type: String, enum: ["rejected", "executed", "failed"], required: true },
  timestamp: { type: Date, required: true },
});

export const SignalRecordModel = mongoose.model<ISignalRecordDoc>("SignalRecord", SignalRecordSchema);
