import mongoose, { Schema, Document } from "mongoose";
import { BookSideName } from "../types/orderbook.types";

export interface ILevelRecord {
  instrument: string;
  side: BookSideName;
  price: number;
  size: number;
  orderCount: number;
  timestamp: Date;
}

export interface IBookLevelDoc extends ILevelRecord, Document {}

const BookLevelSchema: Schema = new Schema({
  instrument: { type: String, required: true, index: true },
  side: { type: String, enum: ["bid", "ask"], required: true },
  price: { type: Number, required: true },
  size: { type: Number, required: true },
  orderCount: { type: Number, default: 0 },
  timestamp: { type: Date, required: true },
});

// Depth archive is high volume; keep one week
BookLevelSchema.index({ timestamp: 1 }, { expireAfterSeconds: 7 * 24 * 3600 });

export const BookLevelUpdateModel = mongoose.model<IBookLevelDoc>("BookLevelUpdate", BookLevelSchema);
