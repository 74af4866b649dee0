export class User {
  id!: string;
  name!: string;
  username!: string;
  email!: string;
  passwordHash!: string | null; // null for accounts created through an OAuth provider
  profileImageUrl!: string | null;
  isSuperuser!: boolean;
  createdAt!: Date;
  updatedAt!: Date;
}
