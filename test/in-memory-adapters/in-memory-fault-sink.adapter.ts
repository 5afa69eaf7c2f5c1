import { FaultSinkPort, MessageFault } from '../../src/application/ports/output/fault-sink.port';
import { ReceivedMessage } from '../../src/domain/entities/received-message.entity';

/**
 * In-Memory Fault Sink Adapter
 * Collects reported faults for assertions
 */
export class InMemoryFaultSinkAdapter implements FaultSinkPort {
  readonly reports: Array<{ fault: MessageFault; message: ReceivedMessage }> = [];

  report(fault: MessageFault, message: ReceivedMessage): void {
    this.reports.push({ fault, message });
  }

  get faults(): MessageFault[] {
    return this.reports.map((report) => report.fault);
  }
}
