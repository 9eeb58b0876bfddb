import type { ReassemblyEvent, ReassemblyEventEmitter } from "./events.js";

export class JsonLinesEventEmitter implements ReassemblyEventEmitter {
  emit(event: ReassemblyEvent): void {
    process.stdout.write(JSON.stringify(event) + "\n");
  }
}
