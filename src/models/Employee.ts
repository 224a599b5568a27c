import mongoose, { Schema, Document } from 'mongoose';

export interface IEmployee extends Document {
  employeeId: number;
  name: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const EmployeeSchema = new Schema<IEmployee>(
  {
    employeeId: { type: Number, required: true, unique: true },
    name: { type: String, required: true, trim: true },
    active: { type: Boolean, default: true },
  },
  { timestamps: true },
);

EmployeeSchema.index({ name: 1 });

export default mongoose.model<IEmployee>('Employee', EmployeeSchema);
