/**
 * User account record.
 *
 * `password` only carries plaintext on its way into the service; stores never
 * see it populated and it is blank once create/update succeed.
 * `id` is 0 and the timestamps are null until a store has persisted the record.
 */
export interface User {
  id: number;
  name: string;
  email: string;
  password: string;
  passwordHash: string;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface NewUserInput {
  name?: string;
  email: string;
  password: string;
}

export function newUser(input: NewUserInput): User {
  return {
    id: 0,
    name: input.name ?? '',
    email: input.email,
    password: input.password,
    passwordHash: '',
    createdAt: null,
    updatedAt: null,
  };
}
