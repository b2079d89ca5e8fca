export type { JobBoardClient } from "./clients/jobBoardClient";
