import { Screen, ScreenStatus } from "@/lib/models";
import { InvalidScreenTransitionError } from "@/lib/services/errors";

const ALLOWED: Record<ScreenStatus, ScreenStatus[]> = {
  pending: ["processing", "skipped"],
  processing: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: []
};

export function isTerminal(status: ScreenStatus): boolean {
  return ALLOWED[status].length === 0;
}

export function transitionScreen(screen: Screen, next: ScreenStatus): Screen {
  if (!ALLOWED[screen.status].includes(next)) {
    throw new InvalidScreenTransitionError(screen.id, screen.status, next);
  }
  screen.status = next;
  return screen;
}
