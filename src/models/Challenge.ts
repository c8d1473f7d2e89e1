import mongoose, { Schema, Model } from "mongoose";

export const CHALLENGE_TYPES = ["streak", "consistency", "pages", "completion", "time"] as const;
export type ChallengeType = (typeof CHALLENGE_TYPES)[number];

export type ChallengeDoc = {
  name: string;
  description: string;
  type: ChallengeType;
  targetValue: number; // days, pages, books or minutes depending on `type`
  rewardPoints: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

const ChallengeSchema = new Schema<ChallengeDoc>(
  {
    name: { type: String, required: true, unique: true, trim: true, maxlength: 255 },
    description: { type: String, default: "", trim: true },
    type: { type: String, required: true, enum: CHALLENGE_TYPES, index: true },
    targetValue: { type: Number, required: true, min: 1 },
    rewardPoints: { type: Number, required: true, default: 0, min: 0 },
    isActive: { type: Boolean, required: true, default: true, index: true },
  },
  { timestamps: true }
);

// Milestone lookups: streak challenge with an exact target
ChallengeSchema.index({ type: 1, targetValue: 1 });

export const Challenge: Model<ChallengeDoc> =
  (mongoose.models.Challenge as Model<ChallengeDoc>) ||
  mongoose.model<ChallengeDoc>("Challenge", ChallengeSchema);
