import { EventEmitter } from "node:events";
import type { IssueRecord, StatusEvent } from "../types.js";

export interface TransitionNotice {
  issue: IssueRecord;
  event: StatusEvent;
}

export class IssueEventEmitter extends EventEmitter {
  emitTransition(notice: TransitionNotice) {
    this.emit("transition", notice);
  }

  onTransition(callback: (notice: TransitionNotice) => void) {
    this.on("transition", callback);
    return () => {
      this.off("transition", callback);
    };
  }
}
