/**
 * Temporary credentials issued by STS for an assumed role.
 *
 * Held in memory for the duration of the run only. Never logged: the logger
 * redacts `secretAccessKey` and `sessionToken` wherever they appear.
 */
export interface TemporaryCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken: string;
  readonly expiration?: Date;
}
