export { tasksReducer, initialState } from "./tasksReducer";
export type { State, Action } from "./tasksReducer";
