// src/models/ReadingSession.ts

import mongoose, { Schema, Model, Types } from "mongoose";

export type ReadingSessionDoc = {
  _id: Types.ObjectId;

  userId: number;
  bookId: Types.ObjectId;

  // Character offset where the session began, used to derive pages at the end
  startPosition: number;

  pagesRead: number;
  durationMinutes: number;

  sessionDate: Date;
  endedAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

const ReadingSessionSchema = new Schema<ReadingSessionDoc>(
  {
    userId: { type: Number, required: true, index: true },
    bookId: { type: Schema.Types.ObjectId, required: true, ref: "Book", index: true },

    startPosition: { type: Number, required: true, default: 0, min: 0 },

    pagesRead: { type: Number, required: true, default: 0, min: 0 },
    durationMinutes: { type: Number, required: true, default: 0, min: 0 },

    sessionDate: { type: Date, required: true, default: () => new Date() },
    endedAt: { type: Date, required: false, default: null },
  },
  { timestamps: true }
);

// Sessions for one book, latest first
ReadingSessionSchema.index({ userId: 1, bookId: 1, sessionDate: -1 });

export const ReadingSession: Model<ReadingSessionDoc> =
  (mongoose.models.ReadingSession as Model<ReadingSessionDoc>) ||
  mongoose.model<ReadingSessionDoc>("ReadingSession", ReadingSessionSchema);
