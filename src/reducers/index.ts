export { tasksReducer, initialState } from "./tasks/tasksReducer";
