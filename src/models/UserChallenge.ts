import mongoose, { Schema, Model, Types } from "mongoose";

export type UserChallengeDoc = {
  userId: number;
  challengeId: Types.ObjectId;

  progress: number;
  isCompleted: boolean;
  completedDate: Date | null;
  startedDate: Date;

  createdAt: Date;
  updatedAt: Date;
};

const UserChallengeSchema = new Schema<UserChallengeDoc>(
  {
    userId: { type: Number, required: true, index: true },
    challengeId: { type: Schema.Types.ObjectId, required: true, ref: "Challenge" },

    progress: { type: Number, required: true, default: 0, min: 0 },
    isCompleted: { type: Boolean, required: true, default: false },
    completedDate: { type: Date, required: false, default: null },
    startedDate: { type: Date, required: true, default: () => new Date() },
  },
  { timestamps: true }
);

// A user is enrolled at most once per challenge
UserChallengeSchema.index({ userId: 1, challengeId: 1 }, { unique: true });
// Open enrollments are re-evaluated on every new reading day
UserChallengeSchema.index({ userId: 1, isCompleted: 1 });

export const UserChallenge: Model<UserChallengeDoc> =
  (mongoose.models.UserChallenge as Model<UserChallengeDoc>) ||
  mongoose.model<UserChallengeDoc>("UserChallenge", UserChallengeSchema);
