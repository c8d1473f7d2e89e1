import mongoose, { Schema, Model } from "mongoose";

export type BookDoc = {
  title: string;
  authors: string;

  // Identifier in the external text archive the content comes from
  archiveId: string | null;
  // Length of the archived text; drives page estimates and progress percentages
  totalChars: number | null;

  createdAt: Date;
  updatedAt: Date;
};

const BookSchema = new Schema<BookDoc>(
  {
    title: { type: String, required: true, trim: true, maxlength: 200 },
    authors: { type: String, default: "", trim: true, maxlength: 200 },

    archiveId: { type: String, default: null, trim: true, index: true },
    totalChars: { type: Number, default: null, min: 0 },
  },
  { timestamps: true }
);

export const Book: Model<BookDoc> =
  (mongoose.models.Book as Model<BookDoc>) || mongoose.model<BookDoc>("Book", BookSchema);
