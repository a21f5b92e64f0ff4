import mongoose, { Schema, Document } from "mongoose";
import { TradeSide } from "../types/orderbook.types";

export interface ITradeRecord {
  instrument: string;
  tradeId: string;
  price: number;
  size: number;
  side: TradeSide;
  timestamp: Date;
}

export interface ITradePrintDoc extends ITradeRecord, Document {}

const TradePrintSchema: Schema = new Schema({
  instrument: { type: String, required: true, index: true },
  tradeId: { type: String, required: true },
  price: { type: Number, required: true },
  size: { type: Number, required: true },
  side: { type: String, enum: ["buy", "sell"], required: true },
  timestamp: { type: Date, required: true, index: true },
});

TradePrintSchema.index({ instrument: 1, tradeId: 1 }, { unique: true });

export const TradePrintModel = mongoose.model<ITradePrintDoc>("TradePrint", TradePrintSchema);
