import { formatPlan } from "../format";

export function plan(): void {
  for (const line of formatPlan()) console.log(line);
}
