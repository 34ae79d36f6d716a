export * from './candidates'
export * from './completion-manager'
