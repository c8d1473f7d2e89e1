import mongoose, { Schema, Model } from "mongoose";

export type UserDoc = {
  userId: number; // external identity (token claim)
  username: string;
  timezone: string; // IANA timezone, defines the user's calendar day

  currentStreak: number;
  longestStreak: number;
  lastReadingDate: Date | null; // instant of the last streak advancement
  streakUpdatedAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

const UserSchema = new Schema<UserDoc>(
  {
    userId: { type: Number, required: true, unique: true, index: true },
    username: { type: String, required: true, unique: true, trim: true, maxlength: 30 },
    timezone: { type: String, required: true, default: "UTC" },

    currentStreak: { type: Number, required: true, default: 0, min: 0 },
    longestStreak: { type: Number, required: true, default: 0, min: 0 },
    lastReadingDate: { type: Date, required: false, default: null },
    streakUpdatedAt: { type: Date, required: false, default: null },
  },
  { timestamps: true }
);

export const User: Model<UserDoc> =
  (mongoose.models.User as Model<UserDoc>) || mongoose.model<UserDoc>("User", UserSchema);
