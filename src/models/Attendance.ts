import mongoose, { Schema, Document } from 'mongoose';

export interface IAttendance extends Document {
  employeeId: number;
  date: string; // yyyy-MM-dd
  status: 'present' | 'absent';
  reason?: string;
  createdAt: Date;
  updatedAt: Date;
}

const AttendanceSchema = new Schema<IAttendance>(
  {
    employeeId: { type: Number, required: true },
    date: { type: String, required: true },
    status: {
      type: String,
      enum: ['present', 'absent'],
      required: true,
    },
    reason: { type: String, trim: true },
  },
  { timestamps: true },
);

// One record per employee and day; writes go through findOneAndUpdate with upsert.
AttendanceSchema.index({ employeeId: 1, date: 1 }, { unique: true });
AttendanceSchema.index({ date: 1 });

export default mongoose.model<IAttendance>('Attendance', AttendanceSchema);
