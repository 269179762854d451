export class HttpException extends Error {
  public status: number;
  public message: string;
  public code?: string;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
    this.message = message;
  }
}
