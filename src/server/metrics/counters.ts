type CodeCounter = Record<string, number>;

export class Counters {
  wsCloseTotal: CodeCounter = {};
  publishTotal = 0;
  deliveryTotal = 0;
  deliveryFailureTotal = 0;
  deliveryTimeoutTotal = 0;
  admissionTotal = 0;
  rejectionTotal = 0;
  kickTotal = 0;

  markWsClose(code: number): void {
    const k = String(code);
    this.wsCloseTotal[k] = (this.wsCloseTotal[k] ?? 0) + 1;
  }
}
