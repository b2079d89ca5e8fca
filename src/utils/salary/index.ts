export { cleanSalary, clampSalary, extractLeadingSalary } from "./salaryCleaning";
