// qa-audit-backend/src/services/serialQueue.ts

/**
 * Esegue i task uno alla volta, nell'ordine di arrivo (singola istanza).
 * Serve a serializzare check duplicati + append dentro lo stesso processo;
 * tra processi diversi la race resta possibile.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // la coda prosegue anche se il task fallisce; l'errore arriva al chiamante via `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
