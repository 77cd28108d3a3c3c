export class Player {
  // clientId persists across refreshes, socketId changes on reconnect
  constructor(
    public readonly clientId: string,
    public socketId: string,
    public name: string,
    public online: boolean = true,
    public lastSeenMs: number = Date.now(),
  ) {}
}
