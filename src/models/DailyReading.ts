import mongoose, { Schema, Model } from "mongoose";

export type DailyReadingDoc = {
  userId: number;
  readingDate: string; // YYYY-MM-DD in the user's timezone
  readingSeconds: number;
  pageCount: number;
  createdAt: Date;
  updatedAt: Date;
};

const DailyReadingSchema = new Schema<DailyReadingDoc>(
  {
    userId: { type: Number, required: true, index: true },
    readingDate: { type: String, required: true },
    readingSeconds: { type: Number, required: true, default: 0, min: 0 },
    pageCount: { type: Number, required: true, default: 0, min: 0 },
  },
  { timestamps: true }
);

// Enforce one row per user per day
DailyReadingSchema.index({ userId: 1, readingDate: 1 }, { unique: true });

export const DailyReading: Model<DailyReadingDoc> =
  (mongoose.models.DailyReading as Model<DailyReadingDoc>) ||
  mongoose.model<DailyReadingDoc>("DailyReading", DailyReadingSchema);
