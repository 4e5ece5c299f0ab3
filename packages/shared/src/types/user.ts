export interface User {
  id: number;
  username: string;
  disabled: boolean;
  passwordHash: string;
  createdAt: string;
}
