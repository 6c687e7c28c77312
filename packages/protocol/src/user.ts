/** A connected session as other clients see it */
export interface SessionProfile {
  id: number;
  name: string;
  privileges: number;
}
