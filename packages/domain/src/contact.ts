export interface Contact {
  id: string;
  userId: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  /** Calendar date, `YYYY-MM-DD`. */
  birthDate: string;
  additionalInfo: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ContactInput {
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  birthDate: string;
  additionalInfo: string | null;
}
