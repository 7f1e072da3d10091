export interface Participant {
  name: string;
  /** Gift currently associated with the participant, if any. */
  gift: number | null;
  createdAt: Date;
}

export interface Gift {
  number: number;
  associated: boolean;
  createdAt: Date;
}

export type AssociationKind = 'participant-gift';

export interface Association {
  id: string;
  participant: string;
  gift: number;
  kind: AssociationKind;
  createdAt: Date;
}

export interface RosterCounts {
  participants: number;
  gifts: number;
  associations: number;
}

export interface BulkAddResult<T> {
  added: T[];
  ignored: T[];
}
