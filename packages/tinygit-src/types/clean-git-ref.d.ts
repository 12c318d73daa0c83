declare module 'clean-git-ref' {
  const cleanGitRef: {
    clean(value: string): string
  }
  export = cleanGitRef
}
