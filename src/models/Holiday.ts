import mongoose, { Schema, Document } from 'mongoose';

export interface IHoliday extends Document {
  date: string; // yyyy-MM-dd
  description: string;
  createdAt: Date;
}

const HolidaySchema = new Schema<IHoliday>({
  date: { type: String, required: true, unique: true },
  description: { type: String, required: true, trim: true },
  createdAt: { type: Date, default: Date.now },
});

export default mongoose.model<IHoliday>('Holiday', HolidaySchema);
