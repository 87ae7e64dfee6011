/**
 * Thrown on any attempt to serialize an object carrying PSVI data. Schema components
 * referenced from PSVI records have no serialized form.
 */
export class NotSerializableError extends Error {
  constructor(public readonly className: string) {
    super(`${className} is not serializable`);
    this.name = 'NotSerializableError';
  }
}
