export type User = {
  userId: number;
  accessToken: string | null;
  updatedAt: Date;
};
