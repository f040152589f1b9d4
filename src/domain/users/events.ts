/**
 * Events published after a user change has been stored.
 */

export type UserEvent =
  | UserCreated
  | UserUpdated
  | UserActivated
  | UserDeactivated
  | UserDeleted;

export interface UserCreated {
  readonly type: 'user.created';
  readonly userId: string;
  readonly email: string;
  readonly name: string;
  readonly createdAt: Date;
}

export interface UserUpdated {
  readonly type: 'user.updated';
  readonly userId: string;
  readonly email: string;
  readonly name: string;
  readonly updatedAt: Date;
}

export interface UserActivated {
  readonly type: 'user.activated';
  readonly userId: string;
  readonly email: string;
  readonly activatedAt: Date;
}

export interface UserDeactivated {
  readonly type: 'user.deactivated';
  readonly userId: string;
  readonly email: string;
  readonly deactivatedAt: Date;
}

export interface UserDeleted {
  readonly type: 'user.deleted';
  readonly userId: string;
  readonly email: string;
  readonly deletedAt: Date;
}
